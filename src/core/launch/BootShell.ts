import type { CommandRunner, QemuTraceEvent, SpawnOptions, SpawnRequestOptions } from "./types"

type SpawnRequestPatch = Partial<Pick<SpawnRequestOptions, "args" | "stdio">>

export class SpawnRequest {
  protected readonly runner: CommandRunner
  protected readonly cmd: string
  protected readonly args: readonly string[]
  protected readonly cwd: string | undefined
  protected readonly env: Readonly<NodeJS.ProcessEnv> | undefined
  protected readonly stdio: SpawnOptions["stdio"]

  protected constructor (options: SpawnRequestOptions) {
    this.runner = options.runner
    this.cmd = options.cmd
    this.args = options.args
    this.cwd = options.cwd
    this.env = options.env
    this.stdio = options.stdio
  }

  /** appended verbatim, after everything set so far */
  public otherArgs (args: readonly string[]) {
    return this.cloneWith({
      args
    })
  }

  public interactive () {
    return this.cloneWith({
      stdio: "inherit"
    })
  }

  public run (): Promise<number> {
    return this.runner.run(this.toSpawnOptions())
  }

  public toSpawnOptions (): SpawnOptions {
    return {
      cmd: this.cmd,
      args: this.args,
      cwd: this.cwd,
      env: this.env,
      stdio: this.stdio
    }
  }

  protected cloneWith (patch: SpawnRequestPatch): SpawnRequest {
    return SpawnRequest.create(this.merge(patch))
  }

  protected merge ({ args = [], ...rest }: SpawnRequestPatch): SpawnRequestOptions {
    return {
      ...this.options(),
      ...rest,
      args: this.args.concat(args)
    }
  }

  protected options (): SpawnRequestOptions {
    return {
      runner: this.runner,
      ...this.toSpawnOptions()
    }
  }

  public static create (options: SpawnRequestOptions) {
    return new SpawnRequest(options)
  }
}

export class QemuSpawnRequest extends SpawnRequest {
  public machine (profile: string) {
    return this.cloneWith({
      args: ["-machine", profile]
    })
  }

  public cpu (model: string) {
    return this.cloneWith({
      args: ["-cpu", model]
    })
  }

  public noSmm () {
    return this.cloneWith({
      args: ["-machine", "smm=off"]
    })
  }

  /** stop instead of rebooting on a triple fault */
  public noReboot () {
    return this.cloneWith({
      args: ["-no-reboot"]
    })
  }

  public serialStdio () {
    return this.cloneWith({
      args: ["-serial", "stdio"]
    })
  }

  public cdrom (image: string) {
    return this.cloneWith({
      args: ["-cdrom", image]
    })
  }

  public trace (events: readonly QemuTraceEvent[]) {
    return this.cloneWith({
      args: ["-d", events.join(",")]
    })
  }

  public gdbStub (port: number) {
    return this.cloneWith({
      args: ["-gdb", `tcp::${port}`]
    })
  }

  /** hold the vCPU at reset until a debugger continues it */
  public paused () {
    return this.cloneWith({
      args: ["-S"]
    })
  }

  protected cloneWith (patch: SpawnRequestPatch): QemuSpawnRequest {
    return new QemuSpawnRequest(this.merge(patch))
  }

  public static create (options: SpawnRequestOptions) {
    return new QemuSpawnRequest(options)
  }
}

export default class BootShell {
  private constructor (
    private readonly runner: CommandRunner
  ) {

  }

  public qemu (binary: string, options: Omit<SpawnOptions, "cmd" | "args"> = {}) {
    return QemuSpawnRequest.create({
      runner: this.runner,
      cmd: binary,
      args: [],
      stdio: "inherit",
      ...options
    })
  }

  public command (options: SpawnOptions) {
    return SpawnRequest.create({
      runner: this.runner,
      ...options
    })
  }

  public make (options: Omit<SpawnOptions, "cmd">): Promise<number> {
    return this.spawn({
      cmd: "make",
      ...options
    })
  }

  public xorriso (options: Omit<SpawnOptions, "cmd">): Promise<number> {
    return this.spawn({
      cmd: "xorriso",
      ...options
    })
  }

  public spawn (options: SpawnOptions): Promise<number> {
    return this.command(options).run()
  }

  public static create ({ runner }: { runner: CommandRunner }) {
    return new BootShell(runner)
  }
}
