import { spawn, type ChildProcessWithoutNullStreams } from 'node:child_process'
import { createInterface } from 'node:readline'
import { setTimeout as delay } from 'node:timers/promises'
import { CommandFailedError, errorMessage } from './errors'
import type { LogSink, RetryPolicy } from '@/types'

export interface CommandSpec {
  command: string
  args: string[]
  cwd?: string
  /** Merged over the server's own environment. */
  env?: NodeJS.ProcessEnv
}

type CommandOptions = Pick<CommandSpec, 'cwd' | 'env'>

export interface CommandResult {
  stdout: string
  stderr: string
  code: number | null
}

const TRANSIENT_CONFLICT_MARKERS = ['409', 'Conflict', 'provisioning state is not terminal']

export function formatCommand(spec: Pick<CommandSpec, 'command' | 'args'>): string {
  return [spec.command, ...spec.args].join(' ')
}

/** Azure answers with a 409 while a resource is still mid-transition. */
export function isTransientConflict(output: string): boolean {
  return TRANSIENT_CONFLICT_MARKERS.some((marker) => output.includes(marker))
}

function spawnChild(command: string, args: string[], cwd?: string, env?: NodeJS.ProcessEnv): ChildProcessWithoutNullStreams {
  return spawn(command, args, {
    cwd,
    env: { ...process.env, ...env },
    shell: false,
  })
}

function collectLines(stream: NodeJS.ReadableStream, onLine: (line: string) => void): Promise<void> {
  return new Promise((resolve) => {
    const reader = createInterface({ input: stream, crlfDelay: Infinity })
    reader.on('line', onLine)
    reader.on('close', () => resolve())
  })
}

/**
 * One execution of `spec`. Stdout and stderr are merged in arrival order and
 * every line goes to `sink` as soon as it is read.
 */
async function runAttempt(spec: CommandSpec, sink: LogSink): Promise<{ code: number | null; output: string }> {
  const lines: string[] = []
  const forward = (line: string) => {
    lines.push(line)
    sink(line)
  }

  let child: ChildProcessWithoutNullStreams
  try {
    child = spawnChild(spec.command, spec.args, spec.cwd, spec.env)
  } catch (error) {
    sink(`[ERROR] ${errorMessage(error)}`)
    return { code: null, output: '' }
  }

  const drained = Promise.all([collectLines(child.stdout, forward), collectLines(child.stderr, forward)])

  const exit = await new Promise<{ code: number | null; spawnFailed: boolean }>((resolve) => {
    child.once('error', (error) => {
      sink(`[ERROR] ${error.message}`)
      resolve({ code: null, spawnFailed: true })
    })
    child.once('close', (code) => resolve({ code, spawnFailed: false }))
  })

  // A process that never started may leave its pipes open.
  if (!exit.spawnFailed) await drained
  return { code: exit.code, output: lines.join('\n') }
}

/**
 * Run an external program with its output streamed into `sink`.
 *
 * Without a retry policy a failure is final. With one, a failure whose output
 * carries a transient-conflict marker is re-run from scratch after
 * `policy.delayMs`, up to `policy.maxRetries` extra attempts.
 */
export async function streamCommand(spec: CommandSpec, sink: LogSink, policy?: RetryPolicy): Promise<void> {
  const commandLine = formatCommand(spec)
  const maxRetries = policy ? Math.max(0, Math.floor(policy.maxRetries)) : 0
  const totalAttempts = maxRetries + 1

  sink(`[CMD] ${commandLine}`)

  for (let attempt = 1; ; attempt++) {
    const { code, output } = await runAttempt(spec, sink)
    sink(`[EXIT ${code ?? 'none'}] ${commandLine}`)
    if (code === 0) return

    const retryable = policy !== undefined && attempt <= maxRetries && isTransientConflict(output)
    if (!retryable) {
      throw new CommandFailedError(commandLine, code, attempt, output)
    }

    const delayMs = policy?.delayMs ?? 0
    sink(`[WARN] Transient conflict detected (exit ${code ?? 'none'}); retrying in ${Math.round(delayMs / 1000)}s`)
    if (delayMs > 0) await delay(delayMs)
    sink(`[RETRY] Attempt ${attempt + 1}/${totalAttempts}: ${commandLine}`)
  }
}

/**
 * Run a command and capture its output, for structured queries whose stdout
 * is parsed rather than shown.
 */
export function runCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    let child: ChildProcessWithoutNullStreams
    try {
      child = spawnChild(command, args, options.cwd, options.env)
    } catch (error) {
      reject(error)
      return
    }

    let stdout = ''
    let stderr = ''

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString()
    })

    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString()
    })

    child.once('error', reject)

    child.once('close', (code) => {
      if (code === 0) {
        resolve({ stdout, stderr, code })
        return
      }
      reject(new CommandFailedError(formatCommand({ command, args }), code, 1, stderr || stdout))
    })
  })
}
