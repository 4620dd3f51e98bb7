import { describe, it, expect, vi, beforeEach } from 'vitest'
import { fail, json, ok, scriptedSpawn, type SpawnCall, type SpawnHandler } from './helpers/fake-process'

const { spawnMock } = vi.hoisted(() => ({ spawnMock: vi.fn() }))
vi.mock('node:child_process', () => ({ spawn: spawnMock }))

import { AzureCliSession, chooseAccount } from '@/lib/cloud-session'
import { AuthenticationFailedError } from '@/lib/errors'

describe('chooseAccount', () => {
  const accounts = [
    { id: 'sub-a', name: 'First' },
    { id: 'sub-b', name: 'Second', isDefault: true },
    { id: 'sub-c', name: 'Third' },
  ]

  it('takes the explicit hint over everything else', () => {
    expect(chooseAccount(accounts, 'sub-x', 'sub-env')).toEqual({ accountId: 'sub-x', strategy: 'explicit' })
  })

  it('falls back to the environment variable', () => {
    expect(chooseAccount(accounts, undefined, 'sub-env')).toEqual({ accountId: 'sub-env', strategy: 'env' })
  })

  it('uses the only account when there is exactly one', () => {
    expect(chooseAccount([{ id: 'sub-a', isDefault: false }])).toEqual({ accountId: 'sub-a', strategy: 'single' })
  })

  it('prefers the CLI default among several', () => {
    expect(chooseAccount(accounts)).toEqual({ accountId: 'sub-b', strategy: 'default-flag' })
  })

  it('takes the first account when none is marked default', () => {
    expect(chooseAccount([{ id: 'sub-a' }, { id: 'sub-c' }])).toEqual({ accountId: 'sub-a', strategy: 'first' })
  })

  it('returns null when nothing is enumerable', () => {
    expect(chooseAccount([])).toBeNull()
  })
})

describe('AzureCliSession', () => {
  let calls: SpawnCall[]
  let lines: string[]
  const sink = (line: string) => {
    lines.push(line)
  }

  function script(handler: SpawnHandler) {
    spawnMock.mockImplementation(scriptedSpawn(handler, calls))
  }

  beforeEach(() => {
    spawnMock.mockReset()
    calls = []
    lines = []
  })

  it('does nothing when the login check is skipped', async () => {
    const session = new AzureCliSession({ skipLoginCheck: true, env: {} })

    expect(await session.connect('sub-x', sink)).toBeNull()
    expect(lines).toEqual(['[AUTH] Skipping Azure login check (AZ_SKIP_LOGIN_CHECK set)'])
    expect(spawnMock).not.toHaveBeenCalled()
  })

  it('reuses an existing session and selects the default account', async () => {
    script(({ args }) => {
      const command = args.join(' ')
      if (command === 'account show -o json') return json({ id: 'sub-b' })
      if (command === 'account list --all -o json') {
        return json([{ id: 'sub-a' }, { id: 'sub-b', isDefault: true }])
      }
      if (command === 'account set --subscription sub-b') return ok()
      throw new Error(`unexpected az ${command}`)
    })
    const session = new AzureCliSession({ env: {} })

    const selection = await session.connect(undefined, sink)

    expect(selection).toEqual({ accountId: 'sub-b', strategy: 'default-flag' })
    expect(lines).toEqual([
      '[AUTH] Existing Azure CLI session found',
      '[AUTH] Subscription set (default-flag): sub-b',
    ])
  })

  it('reads AZ_SUBSCRIPTION_ID without listing accounts', async () => {
    script(() => ok('{}'))
    const session = new AzureCliSession({ env: { AZ_SUBSCRIPTION_ID: 'sub-env' } })

    expect(await session.selectAccount()).toEqual({ accountId: 'sub-env', strategy: 'env' })
    expect(spawnMock).not.toHaveBeenCalled()
  })

  it('falls back to device code login', async () => {
    script(({ args }) => {
      if (args[0] === 'account' && args[1] === 'show') return fail(1, 'Please run az login')
      if (args.join(' ') === 'login') return fail(1, 'no browser available')
      if (args.join(' ') === 'login --use-device-code') return ok('To sign in, use a web browser to open the page')
      return ok('[]')
    })
    const session = new AzureCliSession({ env: {} })

    expect(await session.ensureAuthenticated(sink)).toEqual({
      authenticated: true,
      detail: 'Logged in with device code',
    })
    expect(lines).toContain('To sign in, use a web browser to open the page')
  })

  it('throws when both logins fail', async () => {
    script(() => fail(1, 'ERROR: failed'))
    const session = new AzureCliSession({ bin: 'az', env: {} })

    await expect(session.connect(undefined, sink)).rejects.toBeInstanceOf(AuthenticationFailedError)
    expect(calls.map((call) => call.args.join(' '))).toEqual([
      'account show -o json',
      'login',
      'login --use-device-code',
    ])
    expect(lines.at(-1)).toBe('[AUTH] Azure CLI login failed (both standard and device code)')
  })

  it('continues with a warning when the subscription cannot be set', async () => {
    script(({ args }) => (args[1] === 'set' ? fail(1, 'ERROR: subscription not found') : json({})))
    const session = new AzureCliSession({ env: {} })

    const selection = await session.connect('sub-missing', sink)

    expect(selection).toEqual({ accountId: 'sub-missing', strategy: 'explicit' })
    expect(lines.at(-1)).toBe('[WARN] Failed to set subscription (explicit): sub-missing; continuing')
  })

  it('returns AI services keys', async () => {
    script(() => json({ key1: 'test-key-1', key2: 'test-key-2' }))
    const session = new AzureCliSession({ env: {} })

    expect(await session.aiServicesKeys('demoais', 'RG-demo')).toEqual({
      ok: true,
      value: { key1: 'test-key-1', key2: 'test-key-2' },
    })
    expect(calls[0].args).toEqual([
      'cognitiveservices', 'account', 'keys', 'list', '-n', 'demoais', '-g', 'RG-demo', '-o', 'json',
    ])
  })

  it('reports an unavailable credential instead of throwing', async () => {
    script(() => ({ code: 3, stderr: ['ResourceNotFound'] }))
    const session = new AzureCliSession({ env: {} })

    const result = await session.storageCredentials('demostg', 'RG-demo')

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.reason).toBe(
        'Command failed (exit 3): az storage account show-connection-string -n demostg -g RG-demo -o json'
      )
    }
  })

  it('builds the search URL from the service name', async () => {
    script(() => json([{ name: 'Default', key: 'test-query-key' }]))
    const session = new AzureCliSession({ env: {} })

    expect(await session.searchQueryKey('demosrc', 'RG-demo')).toEqual({
      ok: true,
      value: { url: 'https://demosrc.search.windows.net', queryKey: 'test-query-key' },
    })
  })

  it('treats an empty query key list as unavailable', async () => {
    script(() => json([]))
    const session = new AzureCliSession({ env: {} })

    const result = await session.searchQueryKey('demosrc', 'RG-demo')
    expect(result.ok).toBe(false)
  })
})
