import simpleGit, { type SimpleGit, type SimpleGitProgressEvent } from "simple-git"
import type { OutputChannel } from "../types"

export interface BootloaderRepository {
  clone (options: { url: string, branch: string, localPath: string }): Promise<void>
  pull (localPath: string): Promise<void>
}

/** a git failure has no exit code of its own once simple-git wraps it */
export const GIT_FAILURE_EXIT_CODE = 1

export function gitRepository ({ output, abort, progressHandler }: {
  output: OutputChannel
  abort?: AbortSignal
  progressHandler?: (data: SimpleGitProgressEvent) => void
}): BootloaderRepository {
  const createGit = (baseDir?: string): SimpleGit => {
    const git = simpleGit({
      baseDir,
      config: ["core.autocrlf=false"],
      abort,
      progress (data) {
        const { method, progress, stage, processed, total } = data
        output.appendLine(`git.${method} ${stage} stage ${progress}% complete ${processed}/${total}`)
        progressHandler?.(data)
      }
    })
    git.outputHandler(gitOutputHandler(output))
    return git
  }

  return {
    async clone ({ url, branch, localPath }) {
      await createGit().clone(url, localPath, ["--progress", "--depth=1", "--single-branch", `--branch=${branch}`])
    },
    async pull (localPath) {
      await createGit(localPath).pull(["--ff-only"])
    }
  }
}

function gitOutputHandler(output: OutputChannel) {
  return (_cmd: string, stdout: NodeJS.ReadableStream, stderr: NodeJS.ReadableStream) => {
    stdout.on("data", (buffer: Buffer) => output.append(buffer.toString()))
    stderr.on("data", (buffer: Buffer) => output.append(buffer.toString()))
  }
}
