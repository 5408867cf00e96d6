import type { TJsonObject } from '../../core/types.ts'

export type TDlpEngineFields = {
  engineExpression: string
  /** Ignored when `predefinedEngineName` is set. */
  name?: string
  customDlpEngine?: boolean
  predefinedEngineName?: string
  description?: string
}

/** Either the engine fields, or a complete payload sent as is. */
export type TDlpEngineInput = TDlpEngineFields | { payload: TJsonObject }

export type TPacFileInput = {
  name: string
  description: string
  domain: string
  pacContent: string
  editable?: boolean
  pacUrlObfuscated?: boolean
}
