export * from './constants.ts'
export * from './factories.ts'
export * from './mocks/fetch.mock.ts'
export * from './mocks/requester.mock.ts'
