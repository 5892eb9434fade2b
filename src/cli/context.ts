import { CancelledError } from "../core/exceptions"
import BootShell from "../core/launch/BootShell"
import ProcessRunner from "../core/launch/ProcessRunner"
import { SpawnAbortRequest } from "../core/launch"
import { buildLayout } from "../core/layout"
import type { PipelineContext } from "../core/pipeline"
import { gitRepository } from "../core/provision/repository"
import type { OutputChannel } from "../core/types"
import { Config } from "./config"

const forwardedSignals: ReadonlyArray<{ signal: NodeJS.Signals, exitCode: number }> = [
  { signal: "SIGINT", exitCode: 130 },
  { signal: "SIGTERM", exitCode: 143 }
]

/**
 * Wires the real process runner, git and configuration together.
 * SIGINT/SIGTERM stop the running child through the abort signal
 */
export function createPipelineContext (output: OutputChannel): { context: PipelineContext, dispose: () => void } {
  const controller = new AbortController()

  const listeners = forwardedSignals.map(({ signal, exitCode }) => {
    const listener = () => controller.abort(SpawnAbortRequest.of({
      signal,
      error: new CancelledError(exitCode, `Canceled by ${signal}`)
    }))
    process.once(signal, listener)
    return { signal, listener }
  })

  const runner = ProcessRunner.create({
    output,
    nativeKill: Config.useNodejsNativeKill,
    abort: controller.signal
  })

  const context: PipelineContext = {
    layout: buildLayout(),
    source: Config.bootloaderSource,
    repository: gitRepository({ output, abort: controller.signal }),
    shell: BootShell.create({ runner }),
    output,
    emulator: Config.emulator,
    bootConfig: Config.bootConfigFile,
    abort: controller.signal
  }

  return {
    context,
    dispose () {
      listeners.forEach(({ signal, listener }) => process.removeListener(signal, listener))
    }
  }
}

export type PipelineContextFactory = typeof createPipelineContext

export interface CliOptions {
  output?: OutputChannel
  createContext?: PipelineContextFactory
}
