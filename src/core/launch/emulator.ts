import { DEFAULT_EMULATOR } from "../layout"
import type BootShell from "./BootShell"
import type { QemuSpawnRequest, SpawnRequest } from "./BootShell"

export const EMULATOR_ENV_VAR = "QEMU"

/** read on every call, an override only lives as long as the environment that carries it */
export function resolveEmulator (env: NodeJS.ProcessEnv = process.env): string {
  const override = env[EMULATOR_ENV_VAR]
  return override ? override : DEFAULT_EMULATOR
}

export function launchConfiguration (request: QemuSpawnRequest, { image, extraArgs = [] }: {
  image: string
  extraArgs?: readonly string[]
}): SpawnRequest {
  return request
    .machine("q35")
    .cpu("qemu64")
    .noSmm()
    .noReboot()
    .serialStdio()
    .cdrom(image)
    .trace(["int", "cpu_reset"])
    .otherArgs(extraArgs)
}

/**
 * Runs the emulator against the deployed image and resolves with its exit code.
 * Never retried: a crash is something to look at, not to paper over
 */
export function launchEmulator ({ shell, emulator, image, extraArgs }: {
  shell: BootShell
  emulator: string
  image: string
  extraArgs?: readonly string[]
}): Promise<number> {
  return launchConfiguration(shell.qemu(emulator), { image, extraArgs }).run()
}
