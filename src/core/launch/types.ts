export type StdioMode = "pipe" | "inherit"

export interface SpawnOptions {
  cmd: string
  args: readonly string[]
  cwd?: string,
  env?: Readonly<NodeJS.ProcessEnv>
  /** "inherit" hands the terminal to the child (emulator, debugger) */
  stdio?: StdioMode
}

/**
 * Runs one external command to completion and resolves with its exit code
 */
export interface CommandRunner {
  run (options: SpawnOptions): Promise<number>
}

export interface SpawnRequestOptions extends SpawnOptions {
  runner: CommandRunner
}

export type QemuTraceEvent = "int" | "cpu_reset"
