import { NextResponse } from 'next/server'

interface RateLimitEntry {
  count: number
  resetAt: number
}

interface RateLimiterOptions {
  windowMs: number
  maxRequests: number
  message?: string
}

export function clientKey(request: Request): string {
  return request.headers.get('x-forwarded-for')?.split(',')[0]?.trim() || 'unknown'
}

export function createRateLimiter(options: RateLimiterOptions) {
  const store = new Map<string, RateLimitEntry>()

  // Periodic cleanup every 60s
  const cleanupInterval = setInterval(() => {
    const now = Date.now()
    for (const [key, entry] of store) {
      if (now > entry.resetAt) store.delete(key)
    }
  }, 60_000)
  // Don't prevent process exit
  if (cleanupInterval.unref) cleanupInterval.unref()

  return function checkRateLimit(request: Request): NextResponse | null {
    if (process.env.DEPLOYER_DISABLE_RATE_LIMIT === '1') return null
    const ip = clientKey(request)
    const now = Date.now()
    const entry = store.get(ip)

    if (!entry || now > entry.resetAt) {
      store.set(ip, { count: 1, resetAt: now + options.windowMs })
      return null
    }

    entry.count++
    if (entry.count > options.maxRequests) {
      const retryAfter = Math.max(1, Math.ceil((entry.resetAt - now) / 1000))
      return NextResponse.json(
        { error: options.message || 'Too many requests. Please try again later.' },
        { status: 429, headers: { 'Retry-After': String(retryAfter) } }
      )
    }

    return null
  }
}

/** Create, retry and destroy each start external processes. */
export const mutationLimiter = createRateLimiter({
  windowMs: 60_000,
  maxRequests: 20,
  message: 'Too many deployment requests. Please try again later.',
})

/** Log polling is expected every second or two per open client. */
export const readLimiter = createRateLimiter({
  windowMs: 60_000,
  maxRequests: 240,
})
