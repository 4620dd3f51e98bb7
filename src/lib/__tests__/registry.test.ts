import { describe, it, expect, beforeEach } from 'vitest'
import { DeploymentEventBus, type ServerEvent } from '@/lib/event-bus'
import { DeploymentNotFoundError } from '@/lib/errors'
import { DeploymentRegistry } from '@/lib/registry'
import type { Deployment } from '@/types'

const base: Deployment = {
  id: 'd1',
  status: 'pending',
  parameters: {
    resourceGroupBase: 'demo',
    region: 'eastus',
    includeSearch: false,
    enableModelDeployment: true,
    openaiModelName: 'gpt-4.1',
    openaiModelVersion: '',
    openaiDeploymentSku: 'GlobalStandard',
    modelDeploymentName: 'gpt-4.1',
    servicePrincipalName: 'sp-demo',
    secretExpirationDate: '2027-01-01',
  },
  names: {
    storageAccountName: 's',
    searchServiceName: 'q',
    aiServicesName: 'a',
    aiFoundryHubName: 'h',
    appInsightsName: 'i',
    logAnalyticsWorkspaceName: 'l',
    projectName: 'p',
    suffix: 'abcde',
  },
  account: null,
  log: [],
  outputs: {},
  createdAt: '2026-01-01T00:00:00.000Z',
  updatedAt: '2026-01-01T00:00:00.000Z',
  error: null,
}

describe('DeploymentRegistry', () => {
  let bus: DeploymentEventBus
  let events: ServerEvent[]
  let registry: DeploymentRegistry

  beforeEach(() => {
    bus = new DeploymentEventBus()
    events = []
    bus.subscribe((event) => events.push(event))
    registry = new DeploymentRegistry(bus, () => new Date('2026-01-01T00:10:00.000Z'))
    registry.add(base)
  })

  it('hands out copies that cannot change the registry', () => {
    const copy = registry.get('d1')
    copy?.log.push('tampered')
    if (copy) copy.status = 'completed'

    expect(registry.get('d1')?.log).toEqual([])
    expect(registry.get('d1')?.status).toBe('pending')
  })

  it('rejects a second deployment with the same id', () => {
    expect(() => registry.add(base)).toThrow('Deployment already registered: d1')
  })

  it('publishes status changes with both ends of the transition', () => {
    registry.setStatus('d1', 'provisioning')
    registry.setStatus('d1', 'provisioning')

    const changes = events.filter((event) => event.type === 'deployment.status_changed').map((event) => event.data)
    expect(changes).toEqual([{ id: 'd1', from: 'pending', to: 'provisioning' }])
    expect(registry.get('d1')?.updatedAt).toBe('2026-01-01T00:10:00.000Z')
  })

  it('serves log lines from a cursor without disturbing earlier reads', () => {
    registry.appendLog('d1', 'one')
    registry.appendLog('d1', 'two')
    const first = registry.readLog('d1')
    registry.appendLog('d1', 'three')

    expect(first).toEqual({ lines: ['one', 'two'], cursor: 2, status: 'pending' })
    expect(registry.readLog('d1', first?.cursor)).toEqual({ lines: ['three'], cursor: 3, status: 'pending' })
    expect(registry.readLog('d1')?.lines).toEqual(['one', 'two', 'three'])
    expect(registry.readLog('d1', 99)).toEqual({ lines: [], cursor: 3, status: 'pending' })
  })

  it('numbers log events by line index', () => {
    registry.appendLog('d1', 'one')
    registry.appendLog('d1', 'two')

    const logs = events.filter((event) => event.type === 'deployment.log').map((event) => event.data)
    expect(logs).toEqual([
      { id: 'd1', index: 0, line: 'one' },
      { id: 'd1', index: 1, line: 'two' },
    ])
  })

  it('merges and clears outputs', () => {
    registry.mergeOutputs('d1', { a: '1' })
    registry.mergeOutputs('d1', { b: 2 })
    expect(registry.get('d1')?.outputs).toEqual({ a: '1', b: 2 })

    registry.clearOutputs('d1')
    expect(registry.get('d1')?.outputs).toEqual({})
  })

  it('returns null or throws for unknown ids', () => {
    expect(registry.get('nope')).toBeNull()
    expect(registry.readLog('nope')).toBeNull()
    expect(() => registry.appendLog('nope', 'x')).toThrow(DeploymentNotFoundError)
  })

  it('hydrates persisted deployments without publishing', () => {
    registry.hydrate([{ ...base, id: 'd2', status: 'completed' }])

    expect(registry.list().map((d) => [d.id, d.status])).toEqual([
      ['d1', 'pending'],
      ['d2', 'completed'],
    ])
    expect(events.filter((event) => event.data.id === 'd2')).toEqual([])
  })
})
