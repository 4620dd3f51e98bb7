import pino, { type Logger } from 'pino'

function hasPinoPretty(): boolean {
  try {
    require.resolve('pino-pretty')
    return true
  } catch {
    return false
  }
}

const usePretty =
  process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test' && hasPinoPretty()

export const logger = pino({
  name: 'ai-env-provisioner',
  level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info'),
  ...(usePretty && {
    transport: {
      target: 'pino-pretty',
      options: { colorize: true },
    },
  }),
})

export function createLogger(component: string): Logger {
  return logger.child({ component })
}
