import type { Deployment, OutputValue } from '@/types'

const RULE = '# ============================================================================='

interface EnvEntry {
  key: string
  /** Output keys tried in order; the first non-empty one wins. */
  from?: string[]
  fallback?: (deployment: Deployment) => string | undefined
}

interface EnvSection {
  title: string
  entries: EnvEntry[]
}

const openaiKey = ['azure_openai_api_key_primary', 'azure_openai_key']
const deploymentName = ['openai_model_deployment_name', 'openai_deployment_name']
const modelDeploymentFallback = (deployment: Deployment) => deployment.parameters.modelDeploymentName || undefined

const SECTIONS: EnvSection[] = [
  {
    title: 'Azure Subscription & Service Principal',
    entries: [
      {
        key: 'AZURE_SUBSCRIPTION_ID',
        from: ['subscription_id'],
        fallback: (deployment) => deployment.parameters.subscriptionId ?? deployment.account?.accountId,
      },
      { key: 'AZURE_TENANT_ID', from: ['tenant_id'] },
      { key: 'AZURE_CLIENT_ID', from: ['service_principal_app_id', 'service_principal_client_id'] },
      { key: 'AZURE_CLIENT_SECRET', from: ['service_principal_secret'] },
    ],
  },
  {
    title: 'Azure OpenAI Configuration',
    entries: [
      { key: 'AZURE_OPENAI_ENDPOINT', from: ['azure_openai_endpoint', 'openai_endpoint'] },
      { key: 'AZURE_OPENAI_API_KEY', from: openaiKey },
      { key: 'AZURE_OPENAI_DEPLOYMENT_NAME', from: deploymentName, fallback: modelDeploymentFallback },
      { key: 'AZURE_OPENAI_API_VERSION', from: ['openai_api_version'], fallback: () => '2024-12-01-preview' },
      {
        key: 'AZURE_OPENAI_EMBEDDING_DEPLOYMENT',
        from: ['openai_embedding_deployment_name'],
        fallback: () => 'text-embedding-3-small',
      },
    ],
  },
  {
    title: 'Azure AI Foundry',
    entries: [
      {
        key: 'AI_FOUNDRY_ENDPOINT',
        from: ['azure_ai_inference_endpoint', 'ai_inference_endpoint', 'azure_ai_foundry_project_endpoint'],
      },
      { key: 'AI_FOUNDRY_PROJECT_ENDPOINT', from: ['azure_ai_foundry_project_endpoint', 'foundry_project_endpoint'] },
      { key: 'AI_FOUNDRY_API_KEY', from: openaiKey },
      { key: 'AI_FOUNDRY_DEPLOYMENT_NAME', from: deploymentName, fallback: modelDeploymentFallback },
    ],
  },
  {
    title: 'Azure AI Search Configuration',
    entries: [
      { key: 'AZURE_SEARCH_ENDPOINT', from: ['azure_ai_search_url', 'search_service_endpoint'] },
      { key: 'AZURE_SEARCH_API_KEY', from: ['azure_ai_search_key', 'azure_search_admin_key'] },
      { key: 'AZURE_SEARCH_INDEX_NAME', from: ['search_index_name'], fallback: () => 'ai-search-index' },
    ],
  },
  {
    title: 'Azure Storage',
    entries: [
      { key: 'AZURE_STORAGE_ACCOUNT_NAME', from: ['storage_account_name'] },
      { key: 'AZURE_STORAGE_CONNECTION_STRING', from: ['storage_connection_string'] },
      { key: 'AZURE_STORAGE_ACCOUNT_KEY', from: ['storage_account_key'] },
    ],
  },
  {
    title: 'Logging and Monitoring (Optional)',
    entries: [
      { key: 'LOG_LEVEL', fallback: () => 'INFO' },
      { key: 'APPLICATION_INSIGHTS_CONNECTION_STRING', from: ['app_insights_connection_string'] },
    ],
  },
]

function present(value: OutputValue | undefined): string | undefined {
  if (value === undefined) return undefined
  const text = String(value)
  return text === '' ? undefined : text
}

function resolve(entry: EnvEntry, deployment: Deployment): string | undefined {
  for (const key of entry.from ?? []) {
    const value = present(deployment.outputs[key])
    if (value !== undefined) return value
  }
  return entry.fallback?.(deployment)
}

function quote(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\r?\n/g, '\\n')}"`
}

function formatTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`
}

/** `.env` text for a deployment's outputs; keys with no value are left out. */
export function renderEnvFile(deployment: Deployment, now: Date = new Date()): string {
  const lines = [
    RULE,
    '# Azure AI Environment Configuration',
    RULE,
    `# Generated from deployment: ${deployment.id.slice(0, 8)}`,
    `# Created at: ${formatTimestamp(now)}`,
    '# Never commit .env files with real credentials to version control!',
  ]

  for (const section of SECTIONS) {
    lines.push('', RULE, `# ${section.title}`, RULE)
    for (const entry of section.entries) {
      const value = resolve(entry, deployment)
      if (value !== undefined) lines.push(`${entry.key}=${quote(value)}`)
    }
  }

  return lines.join('\n') + '\n'
}

export function envFileName(id: string): string {
  return `azure-ai-${id.slice(0, 8)}.env`
}
