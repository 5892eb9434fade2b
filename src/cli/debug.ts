#!/usr/bin/env node
import { attachDebugger, parseDebugMode, startPaused } from "../core/debug/bridge"
import { MissingConfigurationError } from "../core/exceptions"
import { DEBUG_PORT } from "../core/layout"
import { Config } from "./config"
import { createPipelineContext, type CliOptions } from "./context"
import { handleError, UsageError } from "./errors"
import { createTerminalOutputChannel } from "./output"

export const usage = `usage:
  kernel-debug r [kernel-binary-path] [emulator-args...]  build, then start paused with a gdb stub on tcp::${DEBUG_PORT}
  kernel-debug [mode] [symbols-file]                      attach gdb to the paused instance`

/**
 * `r` runs the whole pipeline with the emulator paused behind its gdb stub,
 * any other first argument (or none) launches gdb against that stub
 */
export async function debug (argv: readonly string[], {
  output = createTerminalOutputChannel(),
  createContext = createPipelineContext
}: CliOptions = {}): Promise<number> {
  const [token, ...rest] = argv
  const { context, dispose } = createContext(output)

  try {
    if (parseDebugMode(token) === "start-paused") {
      const [first, ...others] = rest
      const explicitKernel = typeof first === "string" && !first.startsWith("-")

      return await startPaused(context, {
        kernel: explicitKernel ? first : kernelFromEnvironment(),
        emulatorArgs: explicitKernel ? others : rest
      })
    }

    const [symbols] = rest
    return await attachDebugger({
      shell: context.shell,
      layout: context.layout,
      symbols
    })
  } catch (e) {
    return handleError(e, output)
  } finally {
    dispose()
  }
}

function kernelFromEnvironment (): string {
  try {
    return Config.kernelBinary
  } catch (e) {
    if (e instanceof MissingConfigurationError) {
      throw new UsageError(`${e.message}\n${usage}`)
    }
    throw e
  }
}

if (require.main === module) {
  void debug(process.argv.slice(2)).then((exitCode) => {
    process.exitCode = exitCode
  })
}
