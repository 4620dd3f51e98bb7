import { DeploymentEventBus, eventBus } from './event-bus'
import { DeploymentNotFoundError } from './errors'
import type {
  AccountSelection,
  Deployment,
  DeploymentOutputs,
  DeploymentStatus,
  LogSlice,
} from '@/types'

/**
 * In-memory working set of deployments for this process.
 *
 * Populated from the state store at startup and mutated only through the
 * methods below, which the orchestrator calls from each deployment's own
 * task. Every mutation is synchronous, so no other task can observe a
 * half-applied change; readers always receive copies.
 */
export class DeploymentRegistry {
  private readonly deployments = new Map<string, Deployment>()

  constructor(
    private readonly bus: DeploymentEventBus = eventBus,
    private readonly now: () => Date = () => new Date(),
  ) {}

  private require(id: string): Deployment {
    const deployment = this.deployments.get(id)
    if (!deployment) throw new DeploymentNotFoundError(id)
    return deployment
  }

  private touch(deployment: Deployment) {
    deployment.updatedAt = this.now().toISOString()
  }

  hydrate(deployments: Deployment[]): void {
    for (const deployment of deployments) {
      this.deployments.set(deployment.id, structuredClone(deployment))
    }
  }

  add(deployment: Deployment): Deployment {
    if (this.deployments.has(deployment.id)) {
      throw new Error(`Deployment already registered: ${deployment.id}`)
    }
    this.deployments.set(deployment.id, structuredClone(deployment))
    this.bus.broadcast('deployment.created', { id: deployment.id, status: deployment.status })
    return structuredClone(deployment)
  }

  has(id: string): boolean {
    return this.deployments.has(id)
  }

  get(id: string): Deployment | null {
    const deployment = this.deployments.get(id)
    return deployment ? structuredClone(deployment) : null
  }

  list(): Deployment[] {
    return [...this.deployments.values()].map((deployment) => structuredClone(deployment))
  }

  status(id: string): DeploymentStatus {
    return this.require(id).status
  }

  setStatus(id: string, status: DeploymentStatus): void {
    const deployment = this.require(id)
    const from = deployment.status
    if (from === status) return
    deployment.status = status
    this.touch(deployment)
    this.bus.broadcast('deployment.status_changed', { id, from, to: status })
  }

  appendLog(id: string, line: string): void {
    const deployment = this.require(id)
    deployment.log.push(line)
    this.bus.broadcast('deployment.log', { id, index: deployment.log.length - 1, line })
  }

  mergeOutputs(id: string, outputs: DeploymentOutputs): void {
    const deployment = this.require(id)
    deployment.outputs = { ...deployment.outputs, ...outputs }
    this.touch(deployment)
    this.bus.broadcast('deployment.outputs', { id, outputs: { ...deployment.outputs } })
  }

  clearOutputs(id: string): void {
    const deployment = this.require(id)
    deployment.outputs = {}
    this.touch(deployment)
    this.bus.broadcast('deployment.outputs', { id, outputs: {} })
  }

  setAccount(id: string, account: AccountSelection): void {
    const deployment = this.require(id)
    deployment.account = { ...account }
    this.touch(deployment)
  }

  setError(id: string, error: string | null): void {
    const deployment = this.require(id)
    deployment.error = error
    this.touch(deployment)
  }

  /** Lines appended since `cursor`, plus the cursor to pass next time. */
  readLog(id: string, cursor = 0): LogSlice | null {
    const deployment = this.deployments.get(id)
    if (!deployment) return null
    const start = Math.min(Math.max(0, Math.floor(cursor)), deployment.log.length)
    return {
      lines: deployment.log.slice(start),
      cursor: deployment.log.length,
      status: deployment.status,
    }
  }
}
