import { copyFile, mkdir, readdir, rm } from 'node:fs/promises'
import path from 'node:path'
import { fileExists, resolveWithin, writeFileAtomic } from './paths'

export const TFVARS_FILE = 'terraform.tfvars'
export const STATE_FILE = 'terraform.tfstate'
export const STATE_BACKUP_FILE = 'terraform.tfstate.backup'
export const METADATA_FILE = 'metadata.json'

const DEFINITION_EXTENSION = '.tf'

function isDefinitionFile(name: string): boolean {
  return path.extname(name) === DEFINITION_EXTENSION
}

/**
 * Per-deployment working directories under one root. Each deployment owns
 * `<root>/<id>` exclusively: terraform runs there with its own tfvars, lock
 * and state files, so concurrent deployments never share tool state.
 */
export class WorkspaceManager {
  constructor(
    readonly root: string,
    private readonly templateDir: string,
  ) {}

  pathFor(id: string): string {
    const dir = resolveWithin(this.root, id)
    if (path.dirname(dir) !== path.resolve(this.root)) {
      throw new Error(`Invalid deployment id for workspace: ${id}`)
    }
    return dir
  }

  /** Create the workspace if needed and copy in every terraform definition. */
  async prepare(id: string): Promise<string> {
    const dir = this.pathFor(id)
    await mkdir(dir, { recursive: true })

    const entries = await readdir(this.templateDir, { withFileTypes: true })
    const definitions = entries.filter((entry) => entry.isFile() && isDefinitionFile(entry.name))
    if (definitions.length === 0) {
      throw new Error(`No terraform definitions found in ${this.templateDir}`)
    }

    for (const entry of definitions) {
      await copyFile(path.join(this.templateDir, entry.name), path.join(dir, entry.name))
    }
    return dir
  }

  async writeInputs(id: string, content: string): Promise<void> {
    const dir = this.pathFor(id)
    await mkdir(dir, { recursive: true })
    await writeFileAtomic(path.join(dir, TFVARS_FILE), content)
  }

  async hasInputs(id: string): Promise<boolean> {
    return fileExists(path.join(this.pathFor(id), TFVARS_FILE))
  }

  /**
   * Remove the copied definitions. The tfvars and state files stay so a later
   * destroy can run without re-deriving anything.
   */
  async cleanupTransient(id: string): Promise<string[]> {
    const dir = this.pathFor(id)
    let names: string[]
    try {
      names = await readdir(dir)
    } catch (error) {
      if (isMissing(error)) return []
      throw error
    }

    const removed: string[] = []
    for (const name of names.filter(isDefinitionFile)) {
      await rm(path.join(dir, name), { force: true })
      removed.push(name)
    }
    return removed
  }

  async hasDurableState(id: string): Promise<boolean> {
    return fileExists(path.join(this.pathFor(id), STATE_FILE))
  }

  /** Only meaningful once the resources the state describes are gone. */
  async removeDurableState(id: string): Promise<void> {
    const dir = this.pathFor(id)
    await rm(path.join(dir, STATE_FILE), { force: true })
    await rm(path.join(dir, STATE_BACKUP_FILE), { force: true })
  }

  async listFiles(id: string): Promise<string[]> {
    try {
      return (await readdir(this.pathFor(id))).sort()
    } catch (error) {
      if (isMissing(error)) return []
      throw error
    }
  }
}

export function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
