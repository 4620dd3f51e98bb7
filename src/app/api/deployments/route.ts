import { NextRequest, NextResponse } from 'next/server'
import { errorResponse, withoutLog } from '@/lib/api'
import { getOrchestrator } from '@/lib/deployments'
import { mutationLimiter, readLimiter } from '@/lib/rate-limit'
import { createDeploymentSchema, validateBody } from '@/lib/validation'

export const dynamic = 'force-dynamic'
export const runtime = 'nodejs'

/**
 * GET /api/deployments - Summaries of every known deployment, newest first
 */
export async function GET(request: NextRequest) {
  const limited = readLimiter(request)
  if (limited) return limited

  try {
    const orchestrator = await getOrchestrator()
    const deployments = await orchestrator.summaries()
    return NextResponse.json({ deployments, total: deployments.length })
  } catch (error) {
    return errorResponse('GET /api/deployments', error)
  }
}

/**
 * POST /api/deployments - Start provisioning a new deployment
 */
export async function POST(request: NextRequest) {
  const limited = mutationLimiter(request)
  if (limited) return limited

  const result = await validateBody(request, createDeploymentSchema)
  if ('error' in result) return result.error

  try {
    const orchestrator = await getOrchestrator()
    const deployment = await orchestrator.create(result.data)
    return NextResponse.json({ deployment: withoutLog(deployment) }, { status: 201 })
  } catch (error) {
    return errorResponse('POST /api/deployments', error)
  }
}
