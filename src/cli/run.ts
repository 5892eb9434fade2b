#!/usr/bin/env node
import { runPipeline } from "../core/pipeline"
import { createPipelineContext, type CliOptions } from "./context"
import { handleError, UsageError } from "./errors"
import { createTerminalOutputChannel } from "./output"

export const usage = "usage: kernel-run <kernel-binary-path> [emulator-args...]"

export async function run (argv: readonly string[], {
  output = createTerminalOutputChannel(),
  createContext = createPipelineContext
}: CliOptions = {}): Promise<number> {
  const [kernel, ...emulatorArgs] = argv
  if (!kernel) {
    return handleError(new UsageError(usage), output)
  }

  const { context, dispose } = createContext(output)
  try {
    return await runPipeline(context, { kernel, emulatorArgs })
  } catch (e) {
    return handleError(e, output)
  } finally {
    dispose()
  }
}

if (require.main === module) {
  void run(process.argv.slice(2)).then((exitCode) => {
    process.exitCode = exitCode
  })
}
