import { StageFailedError } from "./exceptions"
import { assembleImage } from "./image/assemble"
import { deployImage } from "./image/deploy"
import type BootShell from "./launch/BootShell"
import { launchEmulator } from "./launch/emulator"
import type { BootloaderSource, BuildLayout } from "./layout"
import { acquireBuildLock } from "./lock"
import { provisionBootloader } from "./provision"
import type { BootloaderRepository } from "./provision/repository"
import type { OutputChannel, StageName } from "./types"
import { stageLabel } from "./utils/colors"

export interface PipelineContext {
  layout: BuildLayout
  source: BootloaderSource
  repository: BootloaderRepository
  shell: BootShell
  output: OutputChannel
  emulator: string
  /** boot configuration copied next to the kernel */
  bootConfig: string
  platform?: NodeJS.Platform
  /** the signal the runner and git were created with */
  abort?: AbortSignal
}

export interface PipelineRequest {
  kernel: string
  emulatorArgs?: readonly string[]
}

/**
 * provision -> assemble -> deploy under the build lock, then the emulator.
 * Resolves with the emulator's exit code, or the exit code of the first stage that failed
 */
export async function runPipeline (context: PipelineContext, { kernel, emulatorArgs = [] }: PipelineRequest): Promise<number> {
  const { layout, source, repository, shell, output, emulator, bootConfig, platform, abort } = context

  try {
    const lock = await acquireBuildLock(layout.lock)
    try {
      await stage(output, "provision", () => provisionBootloader({ layout, source, repository, shell, output, abort }))
      await stage(output, "assemble", () => assembleImage({ layout, kernel, bootConfig, shell, output }))
      await stage(output, "deploy", () => deployImage({ layout, shell, platform }))
    } finally {
      await lock.release()
    }
  } catch (e) {
    if (e instanceof StageFailedError) {
      return e.exitCode
    }
    throw e
  }

  output.appendLine(`${stageLabel("started", "launch")} ${emulator}`)
  return launchEmulator({
    shell,
    emulator,
    image: layout.image,
    extraArgs: emulatorArgs
  })
}

async function stage<T> (output: OutputChannel, name: StageName, execute: () => Promise<T>): Promise<T> {
  output.appendLine(`${stageLabel("started", "stage")} ${name}`)
  try {
    const result = await execute()
    output.appendLine(`${stageLabel("passed")} ${name}`)
    return result
  } catch (e) {
    const detail = e instanceof StageFailedError ? ` (exit code ${e.exitCode})` : ""
    output.appendLine(`${stageLabel("failed")} ${name}${detail}`)
    throw e
  }
}
