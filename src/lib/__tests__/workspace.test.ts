import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, mkdir, readFile, rm, writeFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { STATE_BACKUP_FILE, STATE_FILE, TFVARS_FILE, WorkspaceManager } from '@/lib/workspace'

describe('WorkspaceManager', () => {
  let tmp: string
  let templates: string
  let workspaces: WorkspaceManager

  beforeEach(async () => {
    tmp = await mkdtemp(path.join(os.tmpdir(), 'workspace-test-'))
    templates = path.join(tmp, 'templates')
    await mkdir(templates)
    await writeFile(path.join(templates, 'main.tf'), 'resource "x" "y" {}\n')
    await writeFile(path.join(templates, 'variables.tf'), 'variable "location" {}\n')
    await writeFile(path.join(templates, 'README.md'), 'not a definition\n')
    workspaces = new WorkspaceManager(path.join(tmp, 'states'), templates)
  })

  afterEach(async () => {
    await rm(tmp, { recursive: true, force: true })
  })

  it('gives every deployment its own directory under the root', () => {
    const a = workspaces.pathFor('deployment-a')
    const b = workspaces.pathFor('deployment-b')

    expect(a).toBe(path.join(tmp, 'states', 'deployment-a'))
    expect(b).toBe(path.join(tmp, 'states', 'deployment-b'))
    expect(a).not.toBe(b)
  })

  it('rejects ids that would leave the root or nest directories', () => {
    expect(() => workspaces.pathFor('../escape')).toThrow()
    expect(() => workspaces.pathFor('a/b')).toThrow('Invalid deployment id for workspace: a/b')
  })

  it('copies only terraform definitions on prepare', async () => {
    const dir = await workspaces.prepare('deployment-a')

    expect(dir).toBe(workspaces.pathFor('deployment-a'))
    expect(await workspaces.listFiles('deployment-a')).toEqual(['main.tf', 'variables.tf'])
  })

  it('is idempotent', async () => {
    await workspaces.prepare('deployment-a')
    await workspaces.prepare('deployment-a')

    expect(await workspaces.listFiles('deployment-a')).toEqual(['main.tf', 'variables.tf'])
  })

  it('fails to prepare when the template directory has no definitions', async () => {
    await rm(path.join(templates, 'main.tf'))
    await rm(path.join(templates, 'variables.tf'))

    await expect(workspaces.prepare('deployment-a')).rejects.toThrow(`No terraform definitions found in ${templates}`)
  })

  it('keeps inputs of concurrent deployments apart', async () => {
    await Promise.all([workspaces.prepare('deployment-a'), workspaces.prepare('deployment-b')])
    await Promise.all([
      workspaces.writeInputs('deployment-a', 'location = "eastus"\n'),
      workspaces.writeInputs('deployment-b', 'location = "westeurope"\n'),
    ])

    const a = await readFile(path.join(workspaces.pathFor('deployment-a'), TFVARS_FILE), 'utf8')
    const b = await readFile(path.join(workspaces.pathFor('deployment-b'), TFVARS_FILE), 'utf8')
    expect(a).toBe('location = "eastus"\n')
    expect(b).toBe('location = "westeurope"\n')
  })

  it('overwrites inputs completely and leaves no temp files', async () => {
    await workspaces.writeInputs('deployment-a', 'location = "eastus"\ninclude_search = true\n')
    await workspaces.writeInputs('deployment-a', 'location = "westus"\n')

    const content = await readFile(path.join(workspaces.pathFor('deployment-a'), TFVARS_FILE), 'utf8')
    expect(content).toBe('location = "westus"\n')
    expect(await workspaces.listFiles('deployment-a')).toEqual([TFVARS_FILE])
    expect(await workspaces.hasInputs('deployment-a')).toBe(true)
  })

  it('removes definitions but keeps inputs and state on cleanup', async () => {
    const dir = await workspaces.prepare('deployment-a')
    await workspaces.writeInputs('deployment-a', 'location = "eastus"\n')
    await writeFile(path.join(dir, STATE_FILE), '{"version":4}')

    const removed = await workspaces.cleanupTransient('deployment-a')

    expect(removed.sort()).toEqual(['main.tf', 'variables.tf'])
    expect(await workspaces.listFiles('deployment-a')).toEqual([STATE_FILE, TFVARS_FILE])
    expect(await workspaces.hasDurableState('deployment-a')).toBe(true)
  })

  it('treats cleanup of a missing workspace as a no-op', async () => {
    expect(await workspaces.cleanupTransient('never-prepared')).toEqual([])
    expect(await workspaces.listFiles('never-prepared')).toEqual([])
  })

  it('removes the state file and its backup', async () => {
    const dir = await workspaces.prepare('deployment-a')
    await writeFile(path.join(dir, STATE_FILE), '{}')
    await writeFile(path.join(dir, STATE_BACKUP_FILE), '{}')

    await workspaces.removeDurableState('deployment-a')

    expect(await workspaces.hasDurableState('deployment-a')).toBe(false)
    expect(await workspaces.listFiles('deployment-a')).toEqual(['main.tf', 'variables.tf'])
  })
})
