import * as assert from "assert"
import { existsSync, lstatSync, mkdirSync, readdirSync, readFileSync, symlinkSync, writeFileSync } from "node:fs"
import { join } from "node:path"
import { StageFailedError } from "../../core/exceptions"
import { assembleImage, isoPackagingArgs } from "../../core/image/assemble"
import { deployImage, deployToolPath } from "../../core/image/deploy"
import BootShell from "../../core/launch/BootShell"
import { bootloaderArtifacts, buildLayout } from "../../core/layout"
import { inWorkspace, MemoryOutputChannel, RecordingRunner } from "../fakes"

const layout = buildLayout()

function prepareCheckout () {
  mkdirSync(layout.checkout, { recursive: true })
  bootloaderArtifacts.forEach(file => writeFileSync(join(layout.checkout, file), `built ${file}`))
}

function assemble (runner: RecordingRunner, kernel: string = "kernel.bin") {
  return assembleImage({
    layout,
    kernel,
    bootConfig: "limine.cfg",
    shell: BootShell.create({ runner }),
    output: new MemoryOutputChannel()
  })
}

suite("Image assembler", () => {
  test("packaging arguments", () => {
    assert.deepStrictEqual(isoPackagingArgs(layout), [
      "-as", "mkisofs",
      "-b", "limine-cd.bin",
      "-no-emul-boot",
      "-boot-load-size", "4",
      "-boot-info-table",
      "--efi-boot", "limine-cd-efi.bin",
      "-efi-boot-part",
      "--efi-boot-image",
      "--protective-msdos-label",
      "target/limine",
      "-o", "target/limine/os.iso"
    ])
  })

  test("exactly one BIOS entry, one EFI entry and a protective MBR", () => {
    const args = isoPackagingArgs(layout)
    const count = (flag: string) => args.filter(arg => arg === flag).length

    assert.strictEqual(count("-b"), 1)
    assert.strictEqual(count("--efi-boot"), 1)
    assert.strictEqual(count("--protective-msdos-label"), 1)
  })

  test("stages every input then packages once", async () => {
    await inWorkspace(async () => {
      prepareCheckout()
      const runner = new RecordingRunner()

      const image = await assemble(runner)

      assert.strictEqual(image, "target/limine/os.iso")
      assert.deepStrictEqual(
        readdirSync("target/limine").sort(),
        ["kernel", "limine-cd-efi.bin", "limine-cd.bin", "limine.cfg", "limine.sys"]
      )
      assert.strictEqual(readFileSync("target/limine/kernel", "utf8"), "kernel v1")
      assert.strictEqual(readFileSync("target/limine/limine.sys", "utf8"), "built limine.sys")
      assert.deepStrictEqual(runner.commands, [["xorriso", ...isoPackagingArgs(layout)]])
    })
  })

  test("a symlinked kernel is staged by value", async () => {
    await inWorkspace(async () => {
      prepareCheckout()
      mkdirSync("out")
      writeFileSync("out/real.bin", "linked kernel")
      symlinkSync("real.bin", "out/kernel.bin")

      await assemble(new RecordingRunner(), "out/kernel.bin")

      assert.strictEqual(lstatSync("target/limine/kernel").isSymbolicLink(), false)
      assert.strictEqual(readFileSync("target/limine/kernel", "utf8"), "linked kernel")
    })
  })

  test("a missing kernel fails before the packager runs", async () => {
    await inWorkspace(async () => {
      prepareCheckout()
      const runner = new RecordingRunner()

      await assert.rejects(
        assemble(runner, "missing.bin"),
        (error: unknown) => error instanceof StageFailedError && error.stage === "assemble" && error.exitCode === 1
      )
      assert.deepStrictEqual(runner.calls, [])
      assert.ok(!existsSync(layout.image))
    })
  })

  test("a missing bootloader artifact fails before the packager runs", async () => {
    await inWorkspace(async () => {
      const runner = new RecordingRunner()

      await assert.rejects(assemble(runner), StageFailedError)
      assert.deepStrictEqual(runner.calls, [])
    })
  })

  test("the previous image is replaced, not packaged into the new one", async () => {
    await inWorkspace(async () => {
      prepareCheckout()
      const imagePresentWhilePackaging: boolean[] = []
      const runner = new RecordingRunner(() => 0, () => {
        imagePresentWhilePackaging.push(existsSync(layout.image))
        writeFileSync(layout.image, "iso")
      })

      await assemble(runner)
      writeFileSync("kernel.bin", "kernel v2")
      await assemble(runner)

      assert.deepStrictEqual(imagePresentWhilePackaging, [false, false])
      assert.strictEqual(readFileSync("target/limine/kernel", "utf8"), "kernel v2")
      assert.deepStrictEqual(
        readdirSync("target/limine").sort(),
        ["kernel", "limine-cd-efi.bin", "limine-cd.bin", "limine.cfg", "limine.sys", "os.iso"]
      )
    })
  })

  test("packager exit code is carried by the error", async () => {
    await inWorkspace(async () => {
      prepareCheckout()

      await assert.rejects(
        assemble(new RecordingRunner(() => 5)),
        (error: unknown) => error instanceof StageFailedError && error.exitCode === 5
      )
    })
  })
})

suite("Deployer", () => {
  test("runs the checkout's deploy tool against the image", async () => {
    const runner = new RecordingRunner()

    await deployImage({ layout, shell: BootShell.create({ runner }), platform: "linux" })

    assert.deepStrictEqual(runner.commands, [["target/deps/limine/limine-deploy", "target/limine/os.iso"]])
  })

  test("windows hosts run the .exe build of the tool", () => {
    assert.strictEqual(deployToolPath("target/deps/limine", "win32"), "target/deps/limine/limine-deploy.exe")
  })

  test("a failed deployment surfaces the tool's exit code", async () => {
    await assert.rejects(
      deployImage({ layout, shell: BootShell.create({ runner: new RecordingRunner(() => 4) }) }),
      (error: unknown) => error instanceof StageFailedError && error.stage === "deploy" && error.exitCode === 4
    )
  })
})
