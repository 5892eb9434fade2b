import { join } from "node:path"

export const BUILD_ROOT = "target"

export const DEFAULT_EMULATOR = "qemu-system-x86_64"

/** port of the emulator's gdb stub, the debugger attaches to the same literal */
export const DEBUG_PORT = 4242

export const IMAGE_NAME = "os.iso"

export interface BootloaderSource {
  repository: string
  /** exact branch or tag, never a moving default branch */
  branch: string
}

export const limineSource: BootloaderSource = {
  repository: "https://github.com/limine-bootloader/limine.git",
  branch: "v4.x-branch-binary"
}

/** names of the files the ISO is built from, as they appear inside the staging directory */
export const stagedFiles = {
  kernel: "kernel",
  bootConfig: "limine.cfg",
  bootSector: "limine.sys",
  biosCdBoot: "limine-cd.bin",
  efiCdBoot: "limine-cd-efi.bin"
} as const

export const bootloaderArtifacts = [
  stagedFiles.bootSector,
  stagedFiles.biosCdBoot,
  stagedFiles.efiCdBoot
] as const

export interface BuildLayout {
  root: string
  checkout: string
  staging: string
  image: string
  lock: string
  gdbCommandFile: string
}

export function buildLayout (root: string = BUILD_ROOT): BuildLayout {
  const staging = join(root, "limine")

  return {
    root,
    checkout: join(root, "deps", "limine"),
    staging,
    image: join(staging, IMAGE_NAME),
    lock: join(root, ".lock"),
    gdbCommandFile: join(root, "debug.gdb")
  }
}
