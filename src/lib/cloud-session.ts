import { z, type ZodType } from 'zod'
import { runCommand, streamCommand } from './command'
import { AuthenticationFailedError, errorMessage } from './errors'
import { azureAccountSchema, type AzureAccount } from './validation'
import type { AccountSelection, CredentialResult, LogSink } from '@/types'

export type AuthResult =
  | { authenticated: true; detail: string }
  | { authenticated: false; reason: string }

export interface AiServicesKeys {
  key1: string
  key2: string | null
}

export interface StorageCredentials {
  connectionString: string
  accountKey: string | null
}

export interface SearchCredentials {
  url: string
  queryKey: string
}

export interface CloudSession {
  /** `az` probe, then interactive login, then device-code login. */
  ensureAuthenticated(sink: LogSink): Promise<AuthResult>
  selectAccount(hint?: string): Promise<AccountSelection | null>
  applyAccount(accountId: string): Promise<boolean>
  /**
   * Authenticate and select an account. Throws `AuthenticationFailedError`
   * when no session can be established; a failed selection is only logged.
   */
  connect(hint: string | undefined, sink: LogSink): Promise<AccountSelection | null>
  aiServicesKeys(name: string, resourceGroup: string): Promise<CredentialResult<AiServicesKeys>>
  storageCredentials(name: string, resourceGroup: string): Promise<CredentialResult<StorageCredentials>>
  searchQueryKey(name: string, resourceGroup: string): Promise<CredentialResult<SearchCredentials>>
}

export interface AzureCliSessionOptions {
  bin?: string
  /** Bypasses authentication and selection entirely. */
  skipLoginCheck?: boolean
  /** Source of `AZ_SUBSCRIPTION_ID`. */
  env?: NodeJS.ProcessEnv
}

const accountListSchema = z.array(azureAccountSchema)

const cognitiveKeysSchema = z.object({
  key1: z.string().min(1),
  key2: z.string().nullish(),
})

const connectionStringSchema = z.object({ connectionString: z.string().min(1) })

const storageKeysSchema = z.array(z.object({ value: z.string() }))

const searchKeysSchema = z.array(z.object({ key: z.string() })).min(1, 'no query keys returned')

/**
 * Pick the account to deploy into. First match wins: explicit hint, the
 * `AZ_SUBSCRIPTION_ID` variable, the only account, the CLI default, the first.
 */
export function chooseAccount(
  accounts: AzureAccount[],
  hint?: string,
  envAccountId?: string,
): AccountSelection | null {
  if (hint) return { accountId: hint, strategy: 'explicit' }
  if (envAccountId) return { accountId: envAccountId, strategy: 'env' }
  if (accounts.length === 0) return null
  if (accounts.length === 1) return { accountId: accounts[0].id, strategy: 'single' }
  const preferred = accounts.find((account) => account.isDefault)
  if (preferred) return { accountId: preferred.id, strategy: 'default-flag' }
  return { accountId: accounts[0].id, strategy: 'first' }
}

async function fetchCredential<T>(load: () => Promise<T>): Promise<CredentialResult<T>> {
  try {
    return { ok: true, value: await load() }
  } catch (error) {
    return { ok: false, reason: errorMessage(error) }
  }
}

/** Cloud session backed by the Azure CLI. */
export class AzureCliSession implements CloudSession {
  private readonly bin: string
  private readonly skipLoginCheck: boolean
  private readonly env: NodeJS.ProcessEnv

  constructor(options: AzureCliSessionOptions = {}) {
    this.bin = options.bin ?? 'az'
    this.skipLoginCheck = options.skipLoginCheck ?? false
    this.env = options.env ?? process.env
  }

  private async json<T>(args: string[], schema: ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const { stdout } = await runCommand(this.bin, [...args, '-o', 'json'])
    const parsed: unknown = JSON.parse(stdout)
    return schema.parse(parsed)
  }

  private async isLoggedIn(): Promise<boolean> {
    try {
      await runCommand(this.bin, ['account', 'show', '-o', 'json'])
      return true
    } catch {
      return false
    }
  }

  private async login(args: string[], sink: LogSink): Promise<boolean> {
    try {
      // Streamed so device codes and browser prompts reach the deployment log.
      await streamCommand({ command: this.bin, args }, sink)
      return true
    } catch (error) {
      sink(`[AUTH] ${errorMessage(error)}`)
      return false
    }
  }

  async ensureAuthenticated(sink: LogSink): Promise<AuthResult> {
    if (this.skipLoginCheck) {
      return { authenticated: true, detail: 'Skipping Azure login check (AZ_SKIP_LOGIN_CHECK set)' }
    }
    if (await this.isLoggedIn()) {
      return { authenticated: true, detail: 'Existing Azure CLI session found' }
    }
    if (await this.login(['login'], sink)) {
      return { authenticated: true, detail: 'Logged in with az login' }
    }
    if (await this.login(['login', '--use-device-code'], sink)) {
      return { authenticated: true, detail: 'Logged in with device code' }
    }
    return { authenticated: false, reason: 'Azure CLI login failed (both standard and device code)' }
  }

  async listAccounts(): Promise<AzureAccount[]> {
    try {
      return await this.json(['account', 'list', '--all'], accountListSchema)
    } catch {
      return []
    }
  }

  async selectAccount(hint?: string): Promise<AccountSelection | null> {
    const envAccountId = this.env.AZ_SUBSCRIPTION_ID?.trim()
    if (hint || envAccountId) return chooseAccount([], hint, envAccountId)
    return chooseAccount(await this.listAccounts())
  }

  async applyAccount(accountId: string): Promise<boolean> {
    try {
      await runCommand(this.bin, ['account', 'set', '--subscription', accountId])
      return true
    } catch {
      return false
    }
  }

  async connect(hint: string | undefined, sink: LogSink): Promise<AccountSelection | null> {
    if (this.skipLoginCheck) {
      sink('[AUTH] Skipping Azure login check (AZ_SKIP_LOGIN_CHECK set)')
      return null
    }

    const auth = await this.ensureAuthenticated(sink)
    if (!auth.authenticated) {
      sink(`[AUTH] ${auth.reason}`)
      throw new AuthenticationFailedError(auth.reason)
    }
    sink(`[AUTH] ${auth.detail}`)

    const selection = await this.selectAccount(hint)
    if (!selection) {
      sink('[AUTH] No subscription could be determined; relying on the CLI default')
      return null
    }

    if (await this.applyAccount(selection.accountId)) {
      sink(`[AUTH] Subscription set (${selection.strategy}): ${selection.accountId}`)
    } else {
      sink(`[WARN] Failed to set subscription (${selection.strategy}): ${selection.accountId}; continuing`)
    }
    return selection
  }

  aiServicesKeys(name: string, resourceGroup: string): Promise<CredentialResult<AiServicesKeys>> {
    return fetchCredential(async () => {
      const keys = await this.json(
        ['cognitiveservices', 'account', 'keys', 'list', '-n', name, '-g', resourceGroup],
        cognitiveKeysSchema,
      )
      return { key1: keys.key1, key2: keys.key2 ?? null }
    })
  }

  storageCredentials(name: string, resourceGroup: string): Promise<CredentialResult<StorageCredentials>> {
    return fetchCredential(async () => {
      const { connectionString } = await this.json(
        ['storage', 'account', 'show-connection-string', '-n', name, '-g', resourceGroup],
        connectionStringSchema,
      )
      const keys = await this.json(['storage', 'account', 'keys', 'list', '-n', name, '-g', resourceGroup], storageKeysSchema)
      return { connectionString, accountKey: keys[0]?.value ?? null }
    })
  }

  searchQueryKey(name: string, resourceGroup: string): Promise<CredentialResult<SearchCredentials>> {
    return fetchCredential(async () => {
      const keys = await this.json(
        ['search', 'query-key', 'list', '--service-name', name, '-g', resourceGroup],
        searchKeysSchema,
      )
      return { url: `https://${name}.search.windows.net`, queryKey: keys[0].key }
    })
  }
}
