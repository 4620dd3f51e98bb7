export type DeploymentErrorCode =
  | 'TOOL_EXECUTION_FAILED'
  | 'AUTHENTICATION_FAILED'
  | 'PRECONDITION_UNMET'
  | 'NOT_FOUND'
  | 'PERSISTENCE_FAILURE'

export class DeploymentError extends Error {
  readonly code: DeploymentErrorCode

  constructor(code: DeploymentErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

export class CommandFailedError extends DeploymentError {
  readonly command: string
  /** `null` when the process never started or was killed by a signal. */
  readonly exitCode: number | null
  readonly attempts: number
  readonly output: string

  constructor(command: string, exitCode: number | null, attempts = 1, output = '') {
    const suffix = attempts > 1 ? ` after ${attempts} attempts` : ''
    super('TOOL_EXECUTION_FAILED', `Command failed${suffix} (exit ${exitCode ?? 'none'}): ${command}`)
    this.command = command
    this.exitCode = exitCode
    this.attempts = attempts
    this.output = output
  }
}

export class AuthenticationFailedError extends DeploymentError {
  constructor(reason: string) {
    super('AUTHENTICATION_FAILED', `Azure authentication failed: ${reason}`)
  }
}

export class PreconditionUnmetError extends DeploymentError {
  constructor(reason: string) {
    super('PRECONDITION_UNMET', reason)
  }
}

export class DeploymentNotFoundError extends DeploymentError {
  constructor(id: string) {
    super('NOT_FOUND', `Deployment not found: ${id}`)
  }
}

export class PersistenceError extends DeploymentError {
  constructor(id: string, cause: unknown) {
    super('PERSISTENCE_FAILURE', `Failed to persist deployment ${id}: ${errorMessage(cause)}`, { cause })
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}

const HTTP_STATUS_BY_CODE: Record<DeploymentErrorCode, number> = {
  TOOL_EXECUTION_FAILED: 502,
  AUTHENTICATION_FAILED: 502,
  PRECONDITION_UNMET: 409,
  NOT_FOUND: 404,
  PERSISTENCE_FAILURE: 500,
}

export function httpStatusFor(error: unknown): number {
  return error instanceof DeploymentError ? HTTP_STATUS_BY_CODE[error.code] : 500
}
