import { join } from "node:path"
import { StageFailedError } from "../exceptions"
import type BootShell from "../launch/BootShell"
import type { BuildLayout } from "../layout"
import { executableName } from "../utils"

export function deployToolPath (checkout: string, platform: NodeJS.Platform = process.platform) {
  return join(checkout, executableName("limine-deploy", platform))
}

/** writes the bootloader's boot record into an already packaged image */
export async function deployImage ({ layout, shell, platform }: {
  layout: Pick<BuildLayout, "checkout" | "image">
  shell: BootShell
  platform?: NodeJS.Platform
}): Promise<void> {
  const exitCode = await shell.spawn({
    cmd: deployToolPath(layout.checkout, platform),
    args: [layout.image]
  })

  if (exitCode !== 0) {
    throw new StageFailedError("deploy", exitCode)
  }
}
