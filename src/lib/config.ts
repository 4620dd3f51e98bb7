import fs from 'node:fs'
import path from 'node:path'
import type { RetryPolicy } from '@/types'

const defaultDataDir = path.join(process.cwd(), '.data')
const dataDir = process.env.DEPLOYER_DATA_DIR || defaultDataDir

export function envFlag(value: string | undefined): boolean {
  if (value === undefined) return false
  const v = value.trim().toLowerCase()
  return v === '1' || v === 'true' || v === 'yes' || v === 'on'
}

function envNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback
  const n = Number(value)
  return Number.isFinite(n) && n >= 0 ? n : fallback
}

function retryPolicy(prefix: string, maxRetries: number, delayMs: number): RetryPolicy {
  return {
    maxRetries: envNumber(process.env[`${prefix}_MAX_RETRIES`], maxRetries),
    delayMs: envNumber(process.env[`${prefix}_RETRY_DELAY_MS`], delayMs),
  }
}

export const config = {
  dataDir,
  deploymentsRoot:
    process.env.DEPLOYER_STATES_DIR || path.join(dataDir, 'deployment_states'),
  templateDir:
    process.env.DEPLOYER_TERRAFORM_DIR || path.join(process.cwd(), 'terraform'),
  terraformBin: process.env.TERRAFORM_BIN || 'terraform',
  azBin: process.env.AZ_BIN || 'az',
  skipLoginCheck: envFlag(process.env.AZ_SKIP_LOGIN_CHECK),
  // Cloud APIs answer concurrent provisioning with 409s; apply backs off longer.
  retry: {
    apply: retryPolicy('DEPLOYER_APPLY', 2, 60_000),
    destroy: retryPolicy('DEPLOYER_DESTROY', 2, 30_000),
  },
  apiKey: process.env.API_KEY || '',
}

export function ensureDirExists(dirPath: string) {
  if (!dirPath) return
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true })
  }
}
