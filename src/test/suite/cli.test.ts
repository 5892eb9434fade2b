import * as assert from "assert"
import { PassThrough } from "node:stream"
import { Config, defaultBootConfigFile } from "../../cli/config"
import { handleError, LauncherError, UsageError } from "../../cli/errors"
import { TerminalOutputChannel } from "../../cli/output"
import { run, usage } from "../../cli/run"
import { BuildLockedError, CancelledError, StageFailedError } from "../../core/exceptions"
import colors from "../../core/utils/colors"
import { fakePipelineContext, inWorkspace, MemoryOutputChannel, RecordingRunner } from "../fakes"

const plain = (output: MemoryOutputChannel) => output.lines.map(line => colors.unstyle(line))

suite("CLI", () => {
  suite("kernel-run", () => {
    test("no kernel prints usage and exits 2", async () => {
      const output = new MemoryOutputChannel()
      let contextCreated = false

      const exitCode = await run([], {
        output,
        createContext: () => {
          contextCreated = true
          return { context: fakePipelineContext(), dispose () {} }
        }
      })

      assert.strictEqual(exitCode, 2)
      assert.strictEqual(contextCreated, false)
      assert.deepStrictEqual(output.lines, [usage])
    })

    test("passes the remaining arguments to the emulator", async () => {
      await inWorkspace(async () => {
        const runner = new RecordingRunner()
        let disposed = false

        const exitCode = await run(["kernel.bin", "-smp", "2"], {
          output: new MemoryOutputChannel(),
          createContext: () => ({
            context: fakePipelineContext({ runner }),
            dispose () {
              disposed = true
            }
          })
        })

        assert.strictEqual(exitCode, 0)
        assert.strictEqual(disposed, true)
        assert.deepStrictEqual(runner.last?.args.slice(-2), ["-smp", "2"])
      })
    })
  })

  suite("error handling", () => {
    test("a failed stage only contributes its exit code", () => {
      const output = new MemoryOutputChannel()

      assert.strictEqual(handleError(new StageFailedError("deploy", 4), output), 4)
      assert.strictEqual(output.text, "")
    })

    test("launcher errors print by severity", () => {
      const output = new MemoryOutputChannel()

      assert.strictEqual(handleError(new LauncherError("disk full"), output), 1)
      assert.strictEqual(handleError(new LauncherError("no symbols", "warning", 0), output), 0)
      assert.strictEqual(handleError(new UsageError("usage: x"), output), 2)

      assert.deepStrictEqual(plain(output), ["error: disk full", "warning: no symbols", "usage: x"])
    })

    test("cancellation keeps the signal's exit code", () => {
      const output = new MemoryOutputChannel()

      assert.strictEqual(handleError(new CancelledError(130, "Canceled by SIGINT"), output), 130)
      assert.deepStrictEqual(plain(output), ["warning: Canceled by SIGINT"])
    })

    test("a held build lock is an error", () => {
      const output = new MemoryOutputChannel()

      assert.strictEqual(handleError(new BuildLockedError("target/.lock", 77), output), 1)
      assert.deepStrictEqual(plain(output), ["error: target/.lock is held by process 77"])
    })

    test("anything else exits 1", () => {
      const output = new MemoryOutputChannel()

      assert.strictEqual(handleError("boom", output), 1)
      assert.deepStrictEqual(plain(output), ["boom"])
    })
  })

  suite("configuration", () => {
    const saved = { ...process.env }

    teardown(() => {
      for (const key of ["QEMU", "LIMINE_CONFIG", "LIMINE_BRANCH", "KERNEL_RUNNER_NATIVE_KILL"]) {
        if (saved[key] === undefined) {
          delete process.env[key]
        } else {
          process.env[key] = saved[key]
        }
      }
    })

    test("the emulator is read from the environment on every access", () => {
      process.env.QEMU = "custom-qemu"
      assert.strictEqual(Config.emulator, "custom-qemu")

      delete process.env.QEMU
      assert.strictEqual(Config.emulator, "qemu-system-x86_64")
    })

    test("boot config and bootloader source have defaults", () => {
      delete process.env.LIMINE_CONFIG
      delete process.env.LIMINE_BRANCH

      assert.strictEqual(Config.bootConfigFile, defaultBootConfigFile)
      assert.ok(defaultBootConfigFile.endsWith("assets/limine.cfg"))
      assert.strictEqual(Config.bootloaderSource.branch, "v4.x-branch-binary")

      process.env.LIMINE_BRANCH = "v5.x-branch-binary"
      assert.strictEqual(Config.bootloaderSource.branch, "v5.x-branch-binary")
    })

    test("native kill is opt in", () => {
      delete process.env.KERNEL_RUNNER_NATIVE_KILL
      assert.strictEqual(Config.useNodejsNativeKill, false)

      process.env.KERNEL_RUNNER_NATIVE_KILL = "1"
      assert.strictEqual(Config.useNodejsNativeKill, true)
    })
  })

  test("terminal output writes lines to its stream", () => {
    const stream = new PassThrough()
    const output = new TerminalOutputChannel(stream)

    output.append("[start]")
    output.appendLine(" make")

    assert.strictEqual(String(stream.read()), "[start] make\n")
  })
})
