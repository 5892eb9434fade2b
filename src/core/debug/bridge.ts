import { outputFile } from "fs-extra"
import type BootShell from "../launch/BootShell"
import { DEBUG_PORT, type BuildLayout } from "../layout"
import { runPipeline, type PipelineContext, type PipelineRequest } from "../pipeline"

export type DebugMode = "start-paused" | "attach"

/** "r" starts the kernel paused behind a gdb stub, anything else attaches a debugger to it */
export function parseDebugMode (token?: string): DebugMode {
  return token === "r" ? "start-paused" : "attach"
}

/** goes after every other emulator argument */
export function debugStubArgs (port: number = DEBUG_PORT): string[] {
  return ["-gdb", `tcp::${port}`, "-S"]
}

/** the full pipeline, with the emulator waiting for a debugger instead of running the kernel */
export function startPaused (context: PipelineContext, { kernel, emulatorArgs = [], port = DEBUG_PORT }: PipelineRequest & {
  port?: number
}): Promise<number> {
  return runPipeline(context, {
    kernel,
    emulatorArgs: emulatorArgs.concat(debugStubArgs(port))
  })
}

export function gdbCommandFile ({ port = DEBUG_PORT, symbols }: { port?: number, symbols?: string } = {}): string {
  const lines: string[] = []
  if (symbols) {
    lines.push(`file ${symbols}`)
  }
  lines.push(`target remote localhost:${port}`)

  return lines.join("\n").concat("\n")
}

/**
 * Launches gdb against an emulator that is expected to be waiting on `port`.
 * There is no liveness check, gdb reports a refused connection itself
 */
export async function attachDebugger ({ shell, layout, port = DEBUG_PORT, symbols, debugger: gdb = "gdb" }: {
  shell: BootShell
  layout: Pick<BuildLayout, "gdbCommandFile">
  port?: number
  symbols?: string
  debugger?: string
}): Promise<number> {
  await outputFile(layout.gdbCommandFile, gdbCommandFile({ port, symbols }))

  return shell.command({
    cmd: gdb,
    args: ["-x", layout.gdbCommandFile]
  }).interactive().run()
}
