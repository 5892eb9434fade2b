import { join } from "node:path"
import { MissingConfigurationError } from "../core/exceptions"
import { resolveEmulator } from "../core/launch/emulator"
import { limineSource, type BootloaderSource } from "../core/layout"

/** shipped with the package, stages the kernel as `boot:///kernel` */
export const defaultBootConfigFile = join(__dirname, "..", "..", "assets", "limine.cfg")

/**
 * Settings come from the environment and are read again on every access
 */
export class Config {
  static get emulator (): string {
    return resolveEmulator(this.env)
  }

  static get kernelBinary (): string {
    return this.required({
      value: this.env.KERNEL_BINARY,
      key: "KERNEL_BINARY",
      errorMessage: "Pass the kernel binary path or set KERNEL_BINARY"
    })
  }

  static get bootConfigFile (): string {
    return this.env.LIMINE_CONFIG || defaultBootConfigFile
  }

  static get bootloaderSource (): BootloaderSource {
    return {
      repository: this.env.LIMINE_REPOSITORY || limineSource.repository,
      branch: this.env.LIMINE_BRANCH || limineSource.branch
    }
  }

  static get useNodejsNativeKill (): boolean {
    const value = this.env.KERNEL_RUNNER_NATIVE_KILL
    return value === "1" || value === "true"
  }

  private static get env (): NodeJS.ProcessEnv {
    return process.env
  }

  private static required<T>({
    value,
    key,
    errorMessage = `${key} is Required`
  }: { value: T | undefined, errorMessage?: string, key: string }): T {
    if (typeof value === "undefined" || value === "") {
      throw new MissingConfigurationError(key, errorMessage)
    }

    return value
  }
}
