import type { TJsonObject } from '../../core/types.ts'
import type { TResourceId } from '../../types/api.ts'

export type THealthReporting = 'NONE' | 'ON_ACCESS' | 'CONTINUOUS'
export type TIcmpAccessType = 'PING_TRACEROUTING' | 'PING' | 'NONE'
export type TBypassType = 'ALWAYS' | 'NEVER' | 'ON_NET'

export type TPortRange = { from: number | string; to: number | string }

export type TApplicationSegmentInput = {
  name: string
  healthReporting: THealthReporting
  /** Domains or IP addresses. */
  domainNames: string[]
  segmentGroupId: string
  /** `[{ id: serverGroupId }]` */
  serverGroups: TJsonObject[]
  commonAppsDto?: TJsonObject[]
  segmentGroupName?: string
  healthCheckType?: string
  clientlessApps?: TJsonObject[]
  inspectionApps?: TJsonObject[]
  sraApps?: TJsonObject[]
  tcpPortRange?: TPortRange | Record<string, never>
  /** Flat `[from, to, ...]` list, being phased out in favour of `tcpPortRange`. */
  tcpPortRanges?: string[]
  udpPortRange?: TPortRange | Record<string, never>
  udpPortRanges?: string[]
  description?: string
  enabled?: boolean
  icmpAccessType?: TIcmpAccessType
  ipAnchored?: boolean
  doubleEncrypt?: boolean
  bypassType?: TBypassType
  isCnameEnabled?: boolean
  selectConnectorCloseToApp?: boolean
  passiveHealthEnabled?: boolean
}

export type TSegmentGroupInput = {
  name: string
  description: string
  enabled?: boolean
}

export type TServerGroupInput = {
  name: string
  description: string
  /** `[{ id: connectorGroupId }]` */
  appConnectorGroups: TJsonObject[]
}

export type TProvisioningAssociationType = 'CONNECTOR_GRP' | 'SERVICE_EDGE_GRP'

export type TPolicyType =
  | 'ACCESS_POLICY'
  | 'GLOBAL_POLICY'
  | 'TIMEOUT_POLICY'
  | 'REAUTH_POLICY'
  | 'SIEM_POLICY'
  | 'CLIENT_FORWARDING_POLICY'
  | 'BYPASS_POLICY'

export type TPolicyOperand = {
  objectType: string
  lhs: string
  rhs: string | number
}

export type TPolicyRuleInput = {
  policySetId: TResourceId
  name: string
  action: 'ALLOW' | 'DENY'
  /** Application operands, e.g. `{ objectType: 'APP', lhs: 'id', rhs: applicationId }` */
  appOperands: TPolicyOperand[]
  /** SAML / SCIM operands joined by `operator`. */
  operands: TPolicyOperand[]
  operator: 'AND' | 'OR'
  description?: string
  customMsg?: string
}
