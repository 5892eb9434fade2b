import kill from "tree-kill"
import { childProcessToPromise, spawnCommand } from "."
import { COMMAND_NOT_FOUND, isErrnoException } from "../exceptions"
import type { OutputChannel } from "../types"
import type { CommandRunner, SpawnOptions } from "./types"
import { cmdToDisplay } from "./utils"

export default class ProcessRunner implements CommandRunner {
  private constructor (
    private readonly output: OutputChannel,
    private readonly nativeKill: boolean,
    private readonly abort?: AbortSignal
  ) {}

  public async run (options: SpawnOptions): Promise<number> {
    this.output.appendLine("[start]")
    this.output.appendLine(cmdToDisplay(options))

    const child = spawnCommand(options)

    if (!this.nativeKill) {
      child.kill = (signal?: NodeJS.Signals | number) => {
        if (!child.pid) {
          return false
        }
        kill(child.pid, signal)
        return true
      }
    }

    try {
      const exitCode = await childProcessToPromise({
        process: child,
        abort: this.abort,
        onData: (buffer: Buffer) => this.output.append(buffer.toString())
      })

      this.output.appendLine(`[exit ${exitCode}] ${options.cmd}`)
      return exitCode
    } catch (e) {
      if (isErrnoException(e) && e.code === "ENOENT") {
        this.output.appendLine(`${options.cmd}: command not found`)
        return COMMAND_NOT_FOUND
      }
      throw e
    }
  }

  public static create ({ output, nativeKill = false, abort }: {
    output: OutputChannel
    /** when the value is false, tree-kill lib is used to kill the process */
    nativeKill?: boolean
    abort?: AbortSignal
  }) {
    return new ProcessRunner(output, nativeKill, abort)
  }
}
