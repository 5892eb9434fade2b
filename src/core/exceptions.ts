import type { StageName } from "./types"

/** exit code a shell reports when the command can't be found */
export const COMMAND_NOT_FOUND = 127

/** an external tool of a pipeline stage failed, `exitCode` is the tool's own exit code */
export class StageFailedError extends Error {
  constructor (
    public readonly stage: StageName,
    public readonly exitCode: number,
    options?: { cause?: unknown }
  ) {
    super(`${stage} failed with exit code ${exitCode}`, options)
    this.name = "StageFailedError"
  }
}

/** another invocation holds the build directories */
export class BuildLockedError extends Error {
  /** `pid` is unknown while the holder is still writing the lock */
  constructor (public readonly lockPath: string, public readonly pid?: number) {
    super(pid === undefined ? `${lockPath} is held by another process` : `${lockPath} is held by process ${pid}`)
    this.name = "BuildLockedError"
  }
}

/** the running child was stopped from outside (e.g. Ctrl-C) */
export class CancelledError extends Error {
  constructor (public readonly exitCode: number, message: string = "Canceled") {
    super(message)
    this.name = "CancelledError"
  }
}

export class MissingConfigurationError extends Error {
  constructor (public readonly key: string, message: string = `${key} is required`) {
    super(message)
    this.name = "MissingConfigurationError"
  }
}

export function isErrnoException (error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error
}
