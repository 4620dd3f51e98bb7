import { EventEmitter } from 'events'
import type { DeploymentOutputs, DeploymentStatus } from '@/types'

/**
 * Server-side event bus for pushing deployment progress to SSE clients.
 * Singleton per server process; tests construct their own instance.
 */

export interface DeploymentEventPayloads {
  'deployment.created': { id: string; status: DeploymentStatus }
  'deployment.status_changed': { id: string; from: DeploymentStatus; to: DeploymentStatus }
  'deployment.log': { id: string; index: number; line: string }
  'deployment.outputs': { id: string; outputs: DeploymentOutputs }
}

export type EventType = keyof DeploymentEventPayloads

export interface ServerEvent<T extends EventType = EventType> {
  type: T
  data: DeploymentEventPayloads[T]
  timestamp: number
}

export class DeploymentEventBus extends EventEmitter {
  private static instance: DeploymentEventBus | null = null

  constructor() {
    super()
    // One listener per connected SSE client.
    this.setMaxListeners(200)
  }

  static getInstance(): DeploymentEventBus {
    if (!DeploymentEventBus.instance) {
      DeploymentEventBus.instance = new DeploymentEventBus()
    }
    return DeploymentEventBus.instance
  }

  /**
   * Broadcast an event to all SSE listeners
   */
  broadcast<T extends EventType>(type: T, data: DeploymentEventPayloads[T]): ServerEvent<T> {
    const event: ServerEvent<T> = { type, data, timestamp: Date.now() }
    this.emit('server-event', event)
    return event
  }

  subscribe(handler: (event: ServerEvent) => void): () => void {
    this.on('server-event', handler)
    return () => {
      this.off('server-event', handler)
    }
  }
}

// Use globalThis to survive HMR in development
const globalBus = globalThis as typeof globalThis & { __deploymentEventBus?: DeploymentEventBus }
export const eventBus = globalBus.__deploymentEventBus ?? DeploymentEventBus.getInstance()
globalBus.__deploymentEventBus = eventBus
