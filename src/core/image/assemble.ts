import { join } from "node:path"
import { copy, mkdirs, remove } from "fs-extra"
import { StageFailedError } from "../exceptions"
import type BootShell from "../launch/BootShell"
import { bootloaderArtifacts, stagedFiles, type BuildLayout } from "../layout"
import type { OutputChannel } from "../types"
import { waitMap } from "../utils"

interface StagedCopy {
  from: string
  to: string
}

/**
 * Flags handed to `xorriso -as mkisofs`: one El Torito BIOS entry, one EFI entry
 * on its own partition, and a protective MBR over the GPT
 */
export function isoPackagingArgs ({ staging, image }: Pick<BuildLayout, "staging" | "image">): string[] {
  return [
    "-as", "mkisofs",
    "-b", stagedFiles.biosCdBoot,
    "-no-emul-boot",
    "-boot-load-size", "4",
    "-boot-info-table",
    "--efi-boot", stagedFiles.efiCdBoot,
    "-efi-boot-part",
    "--efi-boot-image",
    "--protective-msdos-label",
    staging,
    "-o", image
  ]
}

export function stagedCopies ({ layout, kernel, bootConfig }: {
  layout: Pick<BuildLayout, "checkout" | "staging">
  kernel: string
  bootConfig: string
}): StagedCopy[] {
  const { checkout, staging } = layout

  return [
    { from: kernel, to: join(staging, stagedFiles.kernel) },
    { from: bootConfig, to: join(staging, stagedFiles.bootConfig) },
    ...bootloaderArtifacts.map(file => ({ from: join(checkout, file), to: join(staging, file) }))
  ]
}

/**
 * Stages every input into the flat staging directory, then packages it.
 * Returns the path of the produced image
 */
export async function assembleImage ({ layout, kernel, bootConfig, shell, output }: {
  layout: Pick<BuildLayout, "checkout" | "staging" | "image">
  kernel: string
  bootConfig: string
  shell: BootShell
  output: OutputChannel
}): Promise<string> {
  try {
    await mkdirs(layout.staging)

    await waitMap(async ({ from, to }) => {
      await copy(from, to, { overwrite: true, errorOnExist: false, dereference: true })
      output.appendLine(`staged ${from} -> ${to}`)
    }, stagedCopies({ layout, kernel, bootConfig }))

    // the packager reads the whole staging directory, a previous image would end up inside the new one
    await remove(layout.image)
  } catch (e) {
    output.appendLine(e instanceof Error ? e.message : String(e))
    throw new StageFailedError("assemble", 1, { cause: e })
  }

  const exitCode = await shell.xorriso({
    args: isoPackagingArgs(layout)
  })

  if (exitCode !== 0) {
    throw new StageFailedError("assemble", exitCode)
  }

  return layout.image
}
