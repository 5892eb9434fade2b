import { ChildProcess, spawn } from "node:child_process"
import { constants } from "node:os"
import { resolve as resolvePath } from "node:path"
import { mkdirs, pathExists, remove } from "fs-extra"
import { conditionalExecute } from "../utils"
import type { SpawnOptions } from "./types"

export function spawnCommand({ cmd, args, cwd, env = {}, stdio = "pipe" }: SpawnOptions): ChildProcess {
  const child = spawn(cmd, args, {
    cwd,
    shell: false,
    stdio,
    env: {
      ...process.env,
      ...env
    }
  })

  return child
}

export async function scopedCommand<R>({ cwd, execute, tempDir = false }: {
  execute: ScopedCommandExecutor<R>,
  cwd: string
  tempDir?: boolean
}): Promise<R> {
  const cwdBackup = process.cwd()
  const dir = resolvePath(cwd)

  try {
    if (tempDir && !await pathExists(dir)) {
      await mkdirs(dir)
    }

    process.chdir(dir)

    return await execute({
      chdir: process.chdir.bind(process),
      resetCwd: () => process.chdir(dir)
    })
  } finally {
    process.chdir(cwdBackup)
    await conditionalExecute({
      condition: tempDir,
      execute: () => remove(dir)
    })
  }
}

export type ScopedCommandExecutor<R> = ({ chdir }: {
    chdir: (dir: string) => void
    resetCwd: () => void
  }) => R | Promise<R>

/**
 * Resolves with the exit code once the child closes its streams.
 * A signal death maps to 128 + signal number, the way shells report it
 */
export function childProcessToPromise({ process, onData, abort }: {
  process: ChildProcess
  onData?: (data: Buffer) => void
  abort?: AbortSignal
}): Promise<number> {
  return new Promise((resolve, reject) => {
    if (onData) {
      process.stdout?.on("data", onData)
      process.stderr?.on("data", onData)
    }

    const killProcess = () => {
      const request: unknown = abort?.reason
      if (request instanceof SpawnAbortRequest) {
        reject(request.error ?? new Error(`aborted with ${request.signal ?? "SIGTERM"}`))
        process.kill(request.signal)
      } else {
        reject(request)
        process.kill()
      }
    }

    const dispose = () => {
      process.stdout?.removeAllListeners("data")
      process.stderr?.removeAllListeners("data")
      abort?.removeEventListener("abort", killProcess)
    }

    process.on("close", (code, signal) => {
      dispose()
      resolve(exitCodeOf(code, signal))
    })
    process.on("error", (error) => {
      dispose()
      reject(error)
    })

    if (abort?.aborted) {
      killProcess()
    } else {
      abort?.addEventListener("abort", killProcess)
    }
  })
}

export function exitCodeOf (code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) {
    return code
  }

  if (signal) {
    return 128 + constants.signals[signal]
  }

  return 1
}

export class SpawnAbortRequest {
  constructor (
    public readonly signal?: NodeJS.Signals,
    public readonly error?: Error
  ) {}

  static of ({ signal, error }: Pick<SpawnAbortRequest, "error" | "signal"> = {}) {
    return new SpawnAbortRequest(signal, error)
  }
}
