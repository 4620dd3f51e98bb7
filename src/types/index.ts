export const DEPLOYMENT_STATUSES = [
  'pending',
  'provisioning',
  'post_provisioning',
  'completed',
  'destroying',
  'destroyed',
  'failed',
  'destroy_failed',
] as const

export type DeploymentStatus = (typeof DEPLOYMENT_STATUSES)[number]

/** Statuses during which a background task owns the deployment's workspace. */
export const IN_FLIGHT_STATUSES: readonly DeploymentStatus[] = [
  'pending',
  'provisioning',
  'post_provisioning',
  'destroying',
]

export const OPENAI_MODEL_NAMES = ['gpt-4.1', 'gpt-4.1-mini', 'gpt-4o', 'gpt-4o-mini'] as const

export type OpenAIModelName = (typeof OPENAI_MODEL_NAMES)[number]

/** Inputs supplied when a deployment is requested. Never mutated afterwards. */
export interface DeploymentParameters {
  resourceGroupBase: string
  region: string
  includeSearch: boolean
  enableModelDeployment: boolean
  openaiModelName: OpenAIModelName
  openaiModelVersion: string
  openaiDeploymentSku: string
  modelDeploymentName: string
  servicePrincipalName: string
  secretExpirationDate: string
  /** Account hint; wins over every other selection rule. */
  subscriptionId?: string
}

export interface ResourceNames {
  storageAccountName: string
  searchServiceName: string
  aiServicesName: string
  aiFoundryHubName: string
  appInsightsName: string
  logAnalyticsWorkspaceName: string
  projectName: string
  suffix: string
}

export type AccountSelectionStrategy = 'explicit' | 'env' | 'single' | 'default-flag' | 'first'

export interface AccountSelection {
  accountId: string
  strategy: AccountSelectionStrategy
}

export type OutputValue = string | number | boolean

export type DeploymentOutputs = Record<string, OutputValue>

export interface Deployment {
  id: string
  status: DeploymentStatus
  parameters: DeploymentParameters
  names: ResourceNames
  account: AccountSelection | null
  log: string[]
  outputs: DeploymentOutputs
  createdAt: string
  updatedAt: string
  error: string | null
}

export interface DeploymentSummary {
  id: string
  name: string
  status: DeploymentStatus
  createdAt: string
  updatedAt: string
  hasState: boolean
  outputsAvailable: boolean
  region: string
  includeSearch: boolean
  resourceNames: ResourceNames
}

export interface RetryPolicy {
  maxRetries: number
  delayMs: number
}

export interface LogSlice {
  lines: string[]
  cursor: number
  status: DeploymentStatus
}

export type LogSink = (line: string) => void

/** Result of a best-effort lookup whose failure never fails the deployment. */
export type CredentialResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string }
