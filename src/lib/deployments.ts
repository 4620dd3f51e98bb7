import { AzureCliSession } from './cloud-session'
import { config, ensureDirExists } from './config'
import { eventBus } from './event-bus'
import { createLogger } from './logger'
import { DeploymentOrchestrator } from './orchestrator'
import { DeploymentRegistry } from './registry'
import { StateStore } from './state-store'
import { TerraformTool } from './terraform'
import { WorkspaceManager } from './workspace'

const log = createLogger('deployments')

interface Runtime {
  orchestrator: DeploymentOrchestrator
  ready: Promise<void>
}

function createRuntime(): Runtime {
  ensureDirExists(config.deploymentsRoot)

  const orchestrator = new DeploymentOrchestrator({
    registry: new DeploymentRegistry(eventBus),
    store: new StateStore(config.deploymentsRoot),
    workspaces: new WorkspaceManager(config.deploymentsRoot, config.templateDir),
    tool: new TerraformTool(config.terraformBin),
    cloud: new AzureCliSession({ bin: config.azBin, skipLoginCheck: config.skipLoginCheck }),
    retry: config.retry,
  })

  const ready = orchestrator.restore().then(
    () => undefined,
    (error: unknown) => {
      log.error({ err: error }, 'Failed to restore persisted deployments')
      throw error
    },
  )
  return { orchestrator, ready }
}

// Survives HMR in development; one orchestrator per server process.
const globalRuntime = globalThis as typeof globalThis & { __deploymentRuntime?: Runtime }

/** The process-wide orchestrator, restored from disk before first use. */
export async function getOrchestrator(): Promise<DeploymentOrchestrator> {
  if (!globalRuntime.__deploymentRuntime) {
    globalRuntime.__deploymentRuntime = createRuntime()
  }
  const runtime = globalRuntime.__deploymentRuntime
  try {
    await runtime.ready
  } catch (error) {
    // Let the next request try again.
    globalRuntime.__deploymentRuntime = undefined
    throw error
  }
  return runtime.orchestrator
}
