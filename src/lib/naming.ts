import type { ResourceNames } from '@/types'

const LOWERCASE = 'abcdefghijklmnopqrstuvwxyz'

export type RandomSource = () => number

export function sanitizeBase(base: string): string {
  return base.toLowerCase().replace(/[^a-z0-9]/g, '')
}

export function randomSuffix(length = 5, random: RandomSource = Math.random): string {
  let suffix = ''
  for (let i = 0; i < length; i++) {
    suffix += LOWERCASE[Math.floor(random() * LOWERCASE.length) % LOWERCASE.length]
  }
  return suffix
}

/**
 * Azure name length limits per resource role, with the short code each
 * generated name carries between the base and the random suffix.
 */
const NAME_RULES: Record<Exclude<keyof ResourceNames, 'suffix'>, { limit: number; code: string }> = {
  storageAccountName: { limit: 24, code: 'stg' },
  searchServiceName: { limit: 60, code: 'src' },
  aiServicesName: { limit: 40, code: 'ais' },
  aiFoundryHubName: { limit: 40, code: 'hub' },
  appInsightsName: { limit: 40, code: 'appi' },
  logAnalyticsWorkspaceName: { limit: 40, code: 'law' },
  projectName: { limit: 30, code: 'prj' },
}

/**
 * Derive every resource name for a deployment. Called exactly once, when the
 * deployment is created; the result is persisted and never recomputed.
 */
export function buildResourceNames(base: string, random: RandomSource = Math.random): ResourceNames {
  const cleaned = sanitizeBase(base)
  const suffix = randomSuffix(5, random)

  const compose = (limit: number, code: string) => {
    const room = Math.max(0, limit - code.length - suffix.length)
    return (cleaned.slice(0, room) + code + suffix).slice(0, limit)
  }

  return {
    storageAccountName: compose(NAME_RULES.storageAccountName.limit, NAME_RULES.storageAccountName.code),
    searchServiceName: compose(NAME_RULES.searchServiceName.limit, NAME_RULES.searchServiceName.code),
    aiServicesName: compose(NAME_RULES.aiServicesName.limit, NAME_RULES.aiServicesName.code),
    aiFoundryHubName: compose(NAME_RULES.aiFoundryHubName.limit, NAME_RULES.aiFoundryHubName.code),
    appInsightsName: compose(NAME_RULES.appInsightsName.limit, NAME_RULES.appInsightsName.code),
    logAnalyticsWorkspaceName: compose(
      NAME_RULES.logAnalyticsWorkspaceName.limit,
      NAME_RULES.logAnalyticsWorkspaceName.code,
    ),
    projectName: compose(NAME_RULES.projectName.limit, NAME_RULES.projectName.code),
    suffix,
  }
}

/** Terraform receives the resource group with a fixed `RG-` prefix. */
export function resourceGroupName(base: string): string {
  return `RG-${base}`
}
