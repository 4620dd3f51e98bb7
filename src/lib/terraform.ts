import { z } from 'zod'
import { runCommand, streamCommand } from './command'
import { TFVARS_FILE } from './workspace'
import { resourceGroupName } from './naming'
import type {
  DeploymentOutputs,
  DeploymentParameters,
  LogSink,
  OutputValue,
  ResourceNames,
  RetryPolicy,
} from '@/types'

const COGNITIVE_HOST = '.cognitiveservices.azure.com'
const OPENAI_HOST = '.openai.azure.com'
const INFERENCE_HOST = '.services.ai.azure.com'

function hclString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\$\{/g, () => '$${')}"`
}

/** Render the deployment's `terraform.tfvars`. */
export function renderTfvars(
  parameters: DeploymentParameters,
  names: ResourceNames,
  subscriptionId?: string | null,
): string {
  const vars: Array<[string, string | boolean]> = [
    ['rg_name', resourceGroupName(parameters.resourceGroupBase)],
    ['location', parameters.region],
    ['include_search', parameters.includeSearch],
    ['storage_account_name', names.storageAccountName],
    ['search_service_name', names.searchServiceName],
    ['foundry_project_name', names.projectName],
    ['ai_services_name', names.aiServicesName],
    ['ai_foundry_hub_name', names.aiFoundryHubName],
    ['app_insights_name', names.appInsightsName],
    ['log_analytics_workspace_name', names.logAnalyticsWorkspaceName],
    ['enable_model_deployment', parameters.enableModelDeployment],
    ['model_deployment_name', parameters.modelDeploymentName],
    ['openai_model_name', parameters.openaiModelName],
    ['openai_model_version', parameters.openaiModelVersion],
    ['openai_deployment_sku', parameters.openaiDeploymentSku],
    ['service_principal_name', parameters.servicePrincipalName],
    ['secret_expiration_date', parameters.secretExpirationDate],
  ]
  if (subscriptionId) vars.push(['subscription_id', subscriptionId])

  return vars
    .map(([key, value]) => `${key} = ${typeof value === 'boolean' ? String(value) : hclString(value)}`)
    .join('\n') + '\n'
}

const terraformOutputSchema = z.record(z.object({ value: z.unknown() }).passthrough())

function toOutputValue(value: unknown): OutputValue | undefined {
  if (value === null || value === undefined) return undefined
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value
  return JSON.stringify(value)
}

/** `terraform output -json` → `key → value`, dropping nulls. */
export function simplifyOutputs(raw: unknown): DeploymentOutputs {
  const parsed = terraformOutputSchema.parse(raw)
  const outputs: DeploymentOutputs = {}
  for (const [key, entry] of Object.entries(parsed)) {
    const value = toOutputValue(entry.value)
    if (value !== undefined) outputs[key] = value
  }
  return outputs
}

function stringOutput(outputs: DeploymentOutputs, key: string): string | undefined {
  const value = outputs[key]
  return typeof value === 'string' && value ? value : undefined
}

/**
 * Fill in the endpoint keys downstream consumers read but the provider does
 * not always emit. Existing keys are never overwritten.
 */
export function deriveEndpointAliases(outputs: DeploymentOutputs): DeploymentOutputs {
  const result: DeploymentOutputs = { ...outputs }
  const setDefault = (key: string, value: string | undefined) => {
    if (value !== undefined && result[key] === undefined) result[key] = value
  }

  const aiServicesEndpoint = stringOutput(outputs, 'ai_services_endpoint')
  const fromCognitive = (host: string) =>
    aiServicesEndpoint?.includes(COGNITIVE_HOST) ? aiServicesEndpoint.replace(COGNITIVE_HOST, host) : undefined

  const openaiEndpoint = stringOutput(outputs, 'openai_endpoint') ?? fromCognitive(OPENAI_HOST)
  const inferenceEndpoint = stringOutput(outputs, 'ai_inference_endpoint') ?? fromCognitive(INFERENCE_HOST)

  setDefault('azure_ai_services_endpoint', aiServicesEndpoint)
  setDefault('azure_openai_endpoint', openaiEndpoint)
  setDefault('azure_ai_inference_endpoint', inferenceEndpoint)
  setDefault('azure_ai_foundry_project_endpoint', stringOutput(outputs, 'foundry_project_endpoint'))

  return result
}

export interface ProvisioningTool {
  init(cwd: string, sink: LogSink): Promise<void>
  apply(cwd: string, sink: LogSink, policy: RetryPolicy): Promise<void>
  destroy(cwd: string, sink: LogSink, policy: RetryPolicy): Promise<void>
  outputs(cwd: string): Promise<DeploymentOutputs>
}

/** Drives the terraform CLI with the workspace as working directory. */
export class TerraformTool implements ProvisioningTool {
  constructor(private readonly bin = 'terraform') {}

  private get env(): NodeJS.ProcessEnv {
    return { TF_IN_AUTOMATION: '1' }
  }

  init(cwd: string, sink: LogSink): Promise<void> {
    return streamCommand({ command: this.bin, args: ['init', '-input=false', '-no-color'], cwd, env: this.env }, sink)
  }

  apply(cwd: string, sink: LogSink, policy: RetryPolicy): Promise<void> {
    return streamCommand(
      {
        command: this.bin,
        args: ['apply', '-auto-approve', '-input=false', '-no-color', `-var-file=${TFVARS_FILE}`],
        cwd,
        env: this.env,
      },
      sink,
      policy,
    )
  }

  destroy(cwd: string, sink: LogSink, policy: RetryPolicy): Promise<void> {
    return streamCommand(
      {
        command: this.bin,
        args: ['destroy', '-auto-approve', '-input=false', '-no-color', `-var-file=${TFVARS_FILE}`],
        cwd,
        env: this.env,
      },
      sink,
      policy,
    )
  }

  async outputs(cwd: string): Promise<DeploymentOutputs> {
    const { stdout } = await runCommand(this.bin, ['output', '-json', '-no-color'], { cwd, env: this.env })
    const parsed: unknown = JSON.parse(stdout || '{}')
    return simplifyOutputs(parsed)
  }
}
