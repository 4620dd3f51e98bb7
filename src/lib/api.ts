import { NextResponse } from 'next/server'
import { errorMessage, httpStatusFor } from './errors'
import { createLogger } from './logger'
import { deploymentIdSchema } from './validation'
import type { Deployment } from '@/types'

const log = createLogger('api')

export type RouteContext = { params: Promise<{ id: string }> }

/** Resolve and validate the `[id]` segment; a 400 response when malformed. */
export async function deploymentIdFrom(context: RouteContext): Promise<{ id: string } | { error: NextResponse }> {
  const { id } = await context.params
  const parsed = deploymentIdSchema.safeParse(id)
  if (!parsed.success) {
    return { error: NextResponse.json({ error: 'Invalid deployment id' }, { status: 400 }) }
  }
  return { id: parsed.data }
}

export function errorResponse(route: string, error: unknown): NextResponse {
  const status = httpStatusFor(error)
  if (status >= 500) {
    log.error({ err: error, route }, 'Request failed')
  }
  return NextResponse.json({ error: errorMessage(error) }, { status })
}

/** The record as served by the API; the log has its own endpoint. */
export function withoutLog(deployment: Deployment): Omit<Deployment, 'log'> & { logLength: number } {
  const { log: lines, ...rest } = deployment
  return { ...rest, logLength: lines.length }
}
