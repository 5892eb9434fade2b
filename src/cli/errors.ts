import { BuildLockedError, CancelledError, MissingConfigurationError, StageFailedError } from "../core/exceptions"
import type { OutputChannel } from "../core/types"
import colors from "../core/utils/colors"

/** bad command line */
export const USAGE_EXIT_CODE = 2

/**
 * Prints the error and returns the exit code the process should end with.
 * A failed stage already printed the tool's own diagnostics, only the code is carried over
 */
export function handleError (error: unknown, output: OutputChannel): number {
  if (error instanceof StageFailedError) {
    return error.exitCode
  }

  if (error instanceof LauncherError) {
    showMessageOfLauncherError(output, {
      message: error.message,
      severity: error.severity
    })
    return error.exitCode
  }

  if (error instanceof CancelledError) {
    showMessageOfLauncherError(output, { message: error.message, severity: "warning" })
    return error.exitCode
  }

  if (error instanceof BuildLockedError || error instanceof MissingConfigurationError) {
    showMessageOfLauncherError(output, { message: error.message, severity: "error" })
    return 1
  }

  if (error instanceof Error) {
    output.appendLine(colors.red(`[${error.message}] ${error.stack ?? ""}`))
  } else {
    output.appendLine(colors.red(`${error ?? "unknown error"}`))
  }
  return 1
}

export function showMessageOfLauncherError (output: OutputChannel, { message, severity }: { message: string, severity: ErrorSeverity }) {
  switch (severity) {
    case "error":
      output.appendLine(colors.red(`error: ${message}`))
      break
    case "warning":
      output.appendLine(colors.yellow(`warning: ${message}`))
      break
    case "info":
      output.appendLine(message)
      break
  }
}

export class LauncherError extends Error {
  constructor (
    message: string,
    public readonly severity: ErrorSeverity = "error",
    public readonly exitCode: number = 1
  ) {
    super(message)
    this.name = "LauncherError"
  }
}

export type ErrorSeverity = "error" | "warning" | "info"

export class UsageError extends LauncherError {
  constructor (usage: string) {
    super(usage, "info", USAGE_EXIT_CODE)
    this.name = "UsageError"
  }
}
