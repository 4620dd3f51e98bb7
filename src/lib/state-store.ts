import { mkdir, readFile, readdir } from 'node:fs/promises'
import path from 'node:path'
import { z } from 'zod'
import type { Logger } from 'pino'
import { createLogger } from './logger'
import { Mutex } from './mutex'
import { fileExists, resolveWithin, writeFileAtomic } from './paths'
import { deploymentIndexSchema, deploymentRecordSchema, type DeploymentIndex } from './validation'
import { METADATA_FILE, STATE_FILE, isMissing } from './workspace'
import type { Deployment, DeploymentSummary } from '@/types'

export const INDEX_FILE = 'deployments.json'
const INDEX_VERSION = '1.0'

const storedRecordSchema = z.object({
  savedAt: z.string(),
  hasState: z.boolean(),
  deployment: deploymentRecordSchema,
})

type StoredRecord = z.infer<typeof storedRecordSchema>

export function summarize(deployment: Deployment, hasState: boolean, createdAt?: string): DeploymentSummary {
  return {
    id: deployment.id,
    name: deployment.parameters.resourceGroupBase,
    status: deployment.status,
    createdAt: createdAt ?? deployment.createdAt,
    updatedAt: deployment.updatedAt,
    hasState,
    outputsAvailable: Object.keys(deployment.outputs).length > 0,
    region: deployment.parameters.region,
    includeSearch: deployment.parameters.includeSearch,
    resourceNames: deployment.names,
  }
}

/**
 * File-backed deployment records: `<root>/<id>/metadata.json` holds the full
 * record, `<root>/deployments.json` indexes every deployment in creation order.
 */
export class StateStore {
  private readonly indexLock = new Mutex()
  private readonly log: Logger

  constructor(
    readonly root: string,
    log?: Logger,
  ) {
    this.log = log ?? createLogger('state-store')
  }

  get indexPath(): string {
    return path.join(this.root, INDEX_FILE)
  }

  private recordDir(id: string): string {
    return resolveWithin(this.root, id)
  }

  private emptyIndex(): DeploymentIndex {
    return {
      deployments: {},
      metadata: { version: INDEX_VERSION, created: new Date().toISOString() },
    }
  }

  private async readIndex(): Promise<DeploymentIndex> {
    let raw: string
    try {
      raw = await readFile(this.indexPath, 'utf8')
    } catch (error) {
      if (isMissing(error)) return this.rebuildIndex()
      throw error
    }

    const parsed = deploymentIndexSchema.safeParse(safeJson(raw))
    if (!parsed.success) {
      this.log.error({ path: this.indexPath }, 'Deployment index is unreadable; rebuilding it from records')
      return this.rebuildIndex()
    }
    return parsed.data
  }

  /** Index every readable `<root>/<id>/metadata.json`, oldest first. */
  private async rebuildIndex(): Promise<DeploymentIndex> {
    const index = this.emptyIndex()
    let names: string[]
    try {
      const entries = await readdir(this.root, { withFileTypes: true })
      names = entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name)
    } catch (error) {
      if (isMissing(error)) return index
      throw error
    }

    const deployments: Deployment[] = []
    for (const name of names) {
      const deployment = await this.load(name)
      if (deployment?.id === name) deployments.push(deployment)
    }
    deployments.sort((a, b) => a.createdAt.localeCompare(b.createdAt) || a.id.localeCompare(b.id))

    for (const deployment of deployments) {
      const hasState = await fileExists(path.join(this.recordDir(deployment.id), STATE_FILE))
      index.deployments[deployment.id] = summarize(deployment, hasState)
    }
    return index
  }

  /**
   * Persist the complete record, then its index entry. Safe to call after
   * every transition; the index keeps the first `createdAt` it saw.
   */
  async save(deployment: Deployment): Promise<void> {
    const dir = this.recordDir(deployment.id)
    await mkdir(dir, { recursive: true })

    const hasState = await fileExists(path.join(dir, STATE_FILE))
    const record: StoredRecord = {
      savedAt: new Date().toISOString(),
      hasState,
      deployment,
    }
    await writeFileAtomic(path.join(dir, METADATA_FILE), JSON.stringify(record, null, 2))

    await this.indexLock.runExclusive(async () => {
      const index = await this.readIndex()
      const previous = index.deployments[deployment.id]
      index.deployments[deployment.id] = summarize(deployment, hasState, previous?.createdAt)
      await writeFileAtomic(this.indexPath, JSON.stringify(index, null, 2))
    })
  }

  async load(id: string): Promise<Deployment | null> {
    let raw: string
    try {
      raw = await readFile(path.join(this.recordDir(id), METADATA_FILE), 'utf8')
    } catch (error) {
      if (isMissing(error)) return null
      throw error
    }

    const parsed = storedRecordSchema.safeParse(safeJson(raw))
    if (!parsed.success) {
      this.log.warn({ id, issues: parsed.error.issues.length }, 'Ignoring unreadable deployment record')
      return null
    }
    return parsed.data.deployment
  }

  /** Index entries in creation order. */
  async listAll(): Promise<Map<string, DeploymentSummary>> {
    const index = await this.indexLock.runExclusive(() => this.readIndex())
    return new Map(Object.entries(index.deployments))
  }

  /** Every loadable record named by the index, in index order. */
  async loadAll(): Promise<Deployment[]> {
    const summaries = await this.listAll()
    const deployments: Deployment[] = []
    for (const id of summaries.keys()) {
      const deployment = await this.load(id)
      if (deployment) deployments.push(deployment)
    }
    return deployments
  }
}

function safeJson(raw: string): unknown {
  try {
    return JSON.parse(raw)
  } catch {
    return undefined
  }
}
