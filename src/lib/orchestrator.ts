import { randomUUID } from 'node:crypto'
import type { Logger } from 'pino'
import type { CloudSession } from './cloud-session'
import {
  DeploymentNotFoundError,
  PersistenceError,
  PreconditionUnmetError,
  errorMessage,
} from './errors'
import { createLogger } from './logger'
import { buildResourceNames, resourceGroupName, type RandomSource } from './naming'
import type { DeploymentRegistry } from './registry'
import { summarize, type StateStore } from './state-store'
import { deriveEndpointAliases, renderTfvars, type ProvisioningTool } from './terraform'
import type { WorkspaceManager } from './workspace'
import {
  IN_FLIGHT_STATUSES,
  type AccountSelection,
  type Deployment,
  type DeploymentOutputs,
  type DeploymentParameters,
  type DeploymentStatus,
  type DeploymentSummary,
  type LogSink,
  type LogSlice,
  type RetryPolicy,
} from '@/types'

export interface OrchestratorOptions {
  registry: DeploymentRegistry
  store: StateStore
  workspaces: WorkspaceManager
  tool: ProvisioningTool
  cloud: CloudSession
  retry: { apply: RetryPolicy; destroy: RetryPolicy }
  logger?: Logger
  newId?: () => string
  random?: RandomSource
  now?: () => Date
}

/**
 * Statuses from which a fresh provisioning attempt may start. The in-flight
 * ones only reach the check once no task owns the id, i.e. after a restart.
 */
const RETRYABLE_STATUSES: readonly DeploymentStatus[] = ['failed', 'pending', 'provisioning', 'post_provisioning']

/** Statuses from which a teardown may start; `destroying` only when abandoned. */
const DESTROYABLE_STATUSES: readonly DeploymentStatus[] = ['completed', 'failed', 'destroy_failed', 'destroying']

/**
 * Drives deployments through their lifecycle:
 *
 *   pending → provisioning → post_provisioning → completed
 *   completed → destroying → destroyed
 *
 * with `failed` and `destroy_failed` as retriable terminal states. Each
 * provisioning or destroy run is one background task per deployment; its
 * steps run strictly in sequence and the record is persisted after every
 * transition.
 */
export class DeploymentOrchestrator {
  private readonly registry: DeploymentRegistry
  private readonly store: StateStore
  private readonly workspaces: WorkspaceManager
  private readonly tool: ProvisioningTool
  private readonly cloud: CloudSession
  private readonly policies: { apply: RetryPolicy; destroy: RetryPolicy }
  private readonly log: Logger
  private readonly newId: () => string
  private readonly random: RandomSource
  private readonly now: () => Date
  private readonly tasks = new Map<string, Promise<void>>()
  private readonly claims = new Set<string>()

  constructor(options: OrchestratorOptions) {
    this.registry = options.registry
    this.store = options.store
    this.workspaces = options.workspaces
    this.tool = options.tool
    this.cloud = options.cloud
    this.policies = options.retry
    this.log = options.logger ?? createLogger('orchestrator')
    this.newId = options.newId ?? randomUUID
    this.random = options.random ?? Math.random
    this.now = options.now ?? (() => new Date())
  }

  /** Reload every persisted deployment into the registry. */
  async restore(): Promise<number> {
    const deployments = await this.store.loadAll()
    this.registry.hydrate(deployments)
    const abandoned = deployments.filter((deployment) => IN_FLIGHT_STATUSES.includes(deployment.status))
    if (abandoned.length > 0) {
      this.log.warn(
        { ids: abandoned.map((deployment) => deployment.id) },
        'Deployments were in flight when the previous process stopped',
      )
    }
    this.log.info({ count: deployments.length }, 'Restored deployments')
    return deployments.length
  }

  get(id: string): Deployment {
    const deployment = this.registry.get(id)
    if (!deployment) throw new DeploymentNotFoundError(id)
    return deployment
  }

  list(): Deployment[] {
    return this.registry.list()
  }

  /** Index view of every deployment, newest first. */
  async summaries(): Promise<DeploymentSummary[]> {
    const summaries = await Promise.all(
      this.registry
        .list()
        .map(async (deployment) => summarize(deployment, await this.workspaces.hasDurableState(deployment.id))),
    )
    return summaries.sort((a, b) => b.createdAt.localeCompare(a.createdAt))
  }

  observe(id: string, cursor = 0): LogSlice {
    const slice = this.registry.readLog(id, cursor)
    if (!slice) throw new DeploymentNotFoundError(id)
    return slice
  }

  isRunning(id: string): boolean {
    return this.tasks.has(id) || this.claims.has(id)
  }

  /** Resolves once the deployment's current task, if any, has finished. */
  async settled(id: string): Promise<void> {
    await this.tasks.get(id)
  }

  async create(parameters: DeploymentParameters): Promise<Deployment> {
    const id = this.newId()
    const timestamp = this.now().toISOString()
    this.registry.add({
      id,
      status: 'pending',
      parameters: { ...parameters },
      names: buildResourceNames(parameters.resourceGroupBase, this.random),
      account: null,
      log: [],
      outputs: {},
      createdAt: timestamp,
      updatedAt: timestamp,
      error: null,
    })
    this.claims.add(id)
    try {
      this.registry.appendLog(
        id,
        `[INFO] Deployment ${id} created for ${resourceGroupName(parameters.resourceGroupBase)} in ${parameters.region}`,
      )
      await this.persist(id)
    } finally {
      this.claims.delete(id)
    }

    const snapshot = this.get(id)
    this.launch(id, () => this.provision(id))
    return snapshot
  }

  /**
   * Start a fresh provisioning attempt with the same id, names and workspace.
   * Accepted from `failed`, or from a provisioning status no task in this
   * process owns (left behind by a restart). An interrupted teardown is
   * resumed with `destroy`, never by provisioning again.
   */
  retry(id: string): Promise<Deployment> {
    return this.begin(
      id,
      async (deployment) => {
        if (!RETRYABLE_STATUSES.includes(deployment.status)) {
          throw new PreconditionUnmetError(`Deployment ${id} cannot be retried from status ${deployment.status}`)
        }
      },
      (deployment) => `----- Retrying provisioning (previous status: ${deployment.status}) -----`,
      () => this.provision(id),
    )
  }

  /**
   * Rejected before any process starts unless terraform state exists. Also
   * resumes a teardown that a restart interrupted.
   */
  destroy(id: string): Promise<Deployment> {
    return this.begin(
      id,
      async (deployment) => {
        if (!DESTROYABLE_STATUSES.includes(deployment.status)) {
          throw new PreconditionUnmetError(`Deployment ${id} cannot be destroyed from status ${deployment.status}`)
        }
        await this.requireDurableState(id)
      },
      (deployment) => `----- Destroy requested (previous status: ${deployment.status}) -----`,
      () => this.teardown(id),
    )
  }

  /**
   * Check preconditions and start `work` as the deployment's task. The id is
   * claimed for the duration of the checks so two requests cannot both pass.
   */
  private async begin(
    id: string,
    check: (deployment: Deployment) => Promise<void>,
    banner: (deployment: Deployment) => string,
    work: () => Promise<void>,
  ): Promise<Deployment> {
    const deployment = this.get(id)
    if (this.tasks.has(id) || this.claims.has(id)) {
      throw new PreconditionUnmetError(`Deployment ${id} is already running (${deployment.status})`)
    }

    this.claims.add(id)
    try {
      await check(deployment)
      this.registry.appendLog(id, banner(deployment))
      await this.persist(id)
    } finally {
      this.claims.delete(id)
    }

    const snapshot = this.get(id)
    this.launch(id, work)
    return snapshot
  }

  /** The tool's state file is the only record of what exists to destroy. */
  private async requireDurableState(id: string): Promise<void> {
    if (!(await this.workspaces.hasDurableState(id))) {
      throw new PreconditionUnmetError(`No terraform state found for deployment ${id}; nothing to destroy`)
    }
  }

  private launch(id: string, work: () => Promise<void>) {
    const task = work()
      .catch((error: unknown) => {
        this.log.error({ id, err: error }, 'Deployment task crashed')
      })
      .finally(() => {
        this.tasks.delete(id)
      })
    this.tasks.set(id, task)
  }

  private sinkFor(id: string): LogSink {
    return (line) => this.registry.appendLog(id, line)
  }

  private async transition(id: string, status: DeploymentStatus): Promise<void> {
    this.registry.setStatus(id, status)
    this.log.info({ id, status }, 'Deployment status changed')
    await this.persist(id)
  }

  /** A failed save is reported but never interrupts the deployment. */
  private async persist(id: string): Promise<void> {
    const deployment = this.registry.get(id)
    if (!deployment) return
    try {
      await this.store.save(deployment)
    } catch (cause) {
      const error = new PersistenceError(id, cause)
      this.log.error({ id, err: cause }, error.message)
      this.registry.appendLog(id, `[WARN] ${error.message}`)
    }
  }

  private async connect(hint: string | undefined, id: string, sink: LogSink): Promise<AccountSelection | null> {
    const selection = await this.cloud.connect(hint, sink)
    if (selection) this.registry.setAccount(id, selection)
    return selection
  }

  private async provision(id: string): Promise<void> {
    const sink = this.sinkFor(id)
    try {
      this.registry.setError(id, null)
      await this.transition(id, 'provisioning')

      const { parameters, names } = this.get(id)
      const cwd = await this.workspaces.prepare(id)
      sink(`[INFO] Workspace prepared: ${cwd}`)

      const account = await this.connect(parameters.subscriptionId, id, sink)
      await this.workspaces.writeInputs(
        id,
        renderTfvars(parameters, names, parameters.subscriptionId ?? account?.accountId),
      )
      sink('[INFO] Wrote terraform.tfvars')

      await this.tool.init(cwd, sink)
      await this.tool.apply(cwd, sink, this.policies.apply)

      await this.transition(id, 'post_provisioning')
      await this.collectOutputs(id, cwd, sink)

      await this.pruneWorkspace(id, sink)
      await this.transition(id, 'completed')
      sink('[INFO] Deployment completed successfully')
    } catch (error) {
      await this.fail(id, 'failed', error, sink)
    }
    await this.persist(id)
  }

  private async collectOutputs(id: string, cwd: string, sink: LogSink): Promise<void> {
    const outputs = deriveEndpointAliases(await this.tool.outputs(cwd))
    this.registry.mergeOutputs(id, outputs)
    sink(`[INFO] Collected ${Object.keys(outputs).length} terraform output value(s)`)

    const { parameters, names } = this.get(id)
    const resourceGroup = resourceGroupName(parameters.resourceGroupBase)

    sink('[INFO] Retrieving Azure OpenAI (AI Services) keys...')
    const aiKeys = await this.cloud.aiServicesKeys(names.aiServicesName, resourceGroup)
    if (aiKeys.ok) {
      const extra: DeploymentOutputs = { azure_openai_api_key_primary: aiKeys.value.key1 }
      if (aiKeys.value.key2) extra.azure_openai_api_key_secondary = aiKeys.value.key2
      const deploymentName = outputs.openai_deployment_name
      if (typeof deploymentName === 'string' && outputs.openai_model_deployment_name === undefined) {
        extra.openai_model_deployment_name = deploymentName
      }
      this.registry.mergeOutputs(id, extra)
    } else {
      sink(`[WARN] Could not fetch Azure OpenAI keys: ${aiKeys.reason}`)
    }

    sink('[INFO] Retrieving Storage connection string...')
    const storage = await this.cloud.storageCredentials(names.storageAccountName, resourceGroup)
    if (storage.ok) {
      const extra: DeploymentOutputs = { storage_connection_string: storage.value.connectionString }
      if (storage.value.accountKey) extra.storage_account_key = storage.value.accountKey
      this.registry.mergeOutputs(id, extra)
    } else {
      sink(`[WARN] Could not fetch Storage credentials: ${storage.reason}`)
    }

    if (parameters.includeSearch) {
      sink('[INFO] Retrieving Search service query key...')
      const search = await this.cloud.searchQueryKey(names.searchServiceName, resourceGroup)
      if (search.ok) {
        this.registry.mergeOutputs(id, {
          azure_ai_search_url: search.value.url,
          azure_ai_search_key: search.value.queryKey,
        })
      } else {
        sink(`[WARN] Could not fetch Search credentials: ${search.reason}`)
      }
    }
  }

  private async teardown(id: string): Promise<void> {
    const sink = this.sinkFor(id)
    try {
      this.registry.setError(id, null)
      await this.transition(id, 'destroying')

      const { parameters, names, account } = this.get(id)
      const hint = account?.accountId ?? parameters.subscriptionId
      await this.connect(hint, id, sink)

      await this.requireDurableState(id)
      const cwd = await this.workspaces.prepare(id)
      sink(`[INFO] Workspace prepared: ${cwd}`)
      if (!(await this.workspaces.hasInputs(id))) {
        await this.workspaces.writeInputs(id, renderTfvars(parameters, names, hint))
        sink('[INFO] Rewrote missing terraform.tfvars')
      }

      await this.tool.init(cwd, sink)
      await this.tool.destroy(cwd, sink, this.policies.destroy)

      this.registry.clearOutputs(id)
      await this.workspaces.removeDurableState(id)
      sink('[INFO] Removed terraform state')
      await this.pruneWorkspace(id, sink)
      await this.transition(id, 'destroyed')
      sink('[INFO] Resources destroyed')
    } catch (error) {
      await this.fail(id, 'destroy_failed', error, sink)
    }
    await this.persist(id)
  }

  private async pruneWorkspace(id: string, sink: LogSink): Promise<void> {
    const removed = await this.workspaces.cleanupTransient(id)
    if (removed.length > 0) sink(`[INFO] Removed ${removed.length} transient workspace file(s)`)
  }

  private async fail(
    id: string,
    status: 'failed' | 'destroy_failed',
    error: unknown,
    sink: LogSink,
  ): Promise<void> {
    const message = errorMessage(error)
    this.log.error({ id, err: error }, 'Deployment step failed')
    sink(`ERROR: ${message}`)
    this.registry.setError(id, message)
    try {
      await this.pruneWorkspace(id, sink)
    } catch (cleanupError) {
      sink(`[WARN] Failed to remove transient workspace files: ${errorMessage(cleanupError)}`)
    }
    this.registry.setStatus(id, status)
    this.log.info({ id, status }, 'Deployment status changed')
  }
}
