import { dirname } from "node:path"
import { mkdirs, pathExists } from "fs-extra"
import { StageFailedError } from "../exceptions"
import { SpawnAbortRequest } from "../launch"
import type BootShell from "../launch/BootShell"
import type { BootloaderSource, BuildLayout } from "../layout"
import type { OutputChannel } from "../types"
import { GIT_FAILURE_EXIT_CODE, type BootloaderRepository } from "./repository"

/**
 * Leaves an up to date, built bootloader checkout at `layout.checkout`.
 * Clones once, then every call pulls and runs `make` again; nothing is cleaned up on failure
 */
export async function provisionBootloader ({ layout, source, repository, shell, output, abort }: {
  layout: Pick<BuildLayout, "checkout">
  source: BootloaderSource
  repository: BootloaderRepository
  shell: BootShell
  output: OutputChannel
  /** the signal git was started with, an abort surfaces as its own error instead of a failed stage */
  abort?: AbortSignal
}): Promise<void> {
  const { checkout } = layout

  await runGit(abort, async () => {
    if (!await pathExists(checkout)) {
      await mkdirs(dirname(checkout))
      output.appendLine(`cloning ${source.repository} (${source.branch}) into ${checkout}`)
      await repository.clone({
        url: source.repository,
        branch: source.branch,
        localPath: checkout
      })
    }

    await repository.pull(checkout)
  })

  const exitCode = await shell.make({
    args: [],
    cwd: checkout
  })

  if (exitCode !== 0) {
    throw new StageFailedError("provision", exitCode)
  }
}

async function runGit (abort: AbortSignal | undefined, execute: () => Promise<void>) {
  try {
    await execute()
  } catch (e) {
    const request: unknown = abort?.aborted ? abort.reason : undefined
    if (request instanceof SpawnAbortRequest && request.error) {
      throw request.error
    }
    throw new StageFailedError("provision", GIT_FAILURE_EXIT_CODE, { cause: e })
  }
}
