// Main clients
export { ClientConnectorClient } from './client/client-connector.ts'
export type { TClientConnectorClientOptions } from './client/client-connector.ts'
export { AdminPortalClient } from './client/admin-portal.ts'
export type { TAdminPortalClientOptions } from './client/admin-portal.ts'
export { PrivateAccessClient } from './client/private-access.ts'
export type { TPrivateAccessClientOptions } from './client/private-access.ts'
export type { TClientBaseOptions } from './client/client-options.ts'

// Core (for custom surfaces and advanced usage)
export { Transport } from './core/transport.ts'
export type { TTransportOptions } from './core/transport.ts'
export { Session } from './core/session.ts'
export type { TSessionOptions } from './core/session.ts'
export {
  Paginator,
  collectUntilEmptyPage,
  collectByTotalPages,
  DEFAULT_PAGE_SIZE,
  DEFAULT_PAGE_DELAY_MS,
  DEFAULT_TOTAL_PAGES_BOUND,
} from './core/pagination.ts'
export type {
  TEmptyPageLoopOptions,
  TTotalPagesLoopOptions,
  TListingPage,
  TListAllOptions,
} from './core/pagination.ts'

// Providers - Endpoints
export { CloudEndpoint, DEFAULT_PRIVATE_ACCESS_CLOUD } from './providers/endpoint/cloud-endpoint.ts'
export type { TProductSurface } from './providers/endpoint/cloud-endpoint.ts'

// Providers - Authentication
export { ApiKeyLoginAuthenticator } from './providers/auth/api-key-login.ts'
export type { TApiKeyCredentials } from './providers/auth/api-key-login.ts'
export { ClientCredentialsAuthenticator } from './providers/auth/client-credentials.ts'
export type { TClientCredentials } from './providers/auth/client-credentials.ts'
export { PortalSessionAuthenticator } from './providers/auth/portal-session.ts'
export type { TPortalCredentials } from './providers/auth/portal-session.ts'
export { StaticSeedProvider, PortalPageSeedProvider } from './providers/auth/seed-provider.ts'
export type { TPortalPageSeedProviderOptions } from './providers/auth/seed-provider.ts'
export { obfuscateApiKey } from './providers/auth/api-key-obfuscation.ts'

// Errors
export {
  SdkError,
  ConfigurationError,
  AuthError,
  InvalidCredentialsError,
  InvalidApiKeyError,
  APIError,
  TimeoutError,
  AbortOperationError,
} from './core/errors.ts'
export type { TAuthFailureReason } from './core/errors.ts'

// Types
export type {
  TEndpointProvider,
  THttpMethod,
  TQueryString,
  TRequestOptions,
  TJsonObject,
  TRawResponse,
  TAuthAttachment,
  TAuthenticator,
  TSeedProvider,
  TTotalPagesBound,
  TListingDialect,
  TListQuery,
  TPagedListQuery,
  TRequester,
} from './core/types.ts'
export type { TResourceId } from './types/api.ts'

export type { TDevicesApi } from './domains/devices/devices.api.ts'
export type {
  TDeviceOsType,
  TListDevicesFilter,
  TRemoveDevicesRequest,
  TForceRemoveDevicesRequest,
} from './domains/devices/types.ts'

export type { TDlpApi } from './domains/portal/dlp.api.ts'
export type { TPacFilesApi } from './domains/portal/pac-files.api.ts'
export type { TSettingsApi } from './domains/portal/settings.api.ts'
export type { TAdministrationApi } from './domains/portal/administration.api.ts'
export type { TRulesApi } from './domains/portal/rules.api.ts'
export type { TDlpEngineFields, TDlpEngineInput, TPacFileInput } from './domains/portal/types.ts'

export type { TApplicationsApi } from './domains/private-access/applications.api.ts'
export type { TConnectorsApi } from './domains/private-access/connectors.api.ts'
export type { TServersApi } from './domains/private-access/servers.api.ts'
export type { TCertificatesApi } from './domains/private-access/certificates.api.ts'
export type { TIdentityApi } from './domains/private-access/identity.api.ts'
export type { TPoliciesApi } from './domains/private-access/policies.api.ts'
export type {
  TApplicationSegmentInput,
  TSegmentGroupInput,
  TServerGroupInput,
  TProvisioningAssociationType,
  TPolicyType,
  TPolicyOperand,
  TPolicyRuleInput,
} from './domains/private-access/types.ts'
