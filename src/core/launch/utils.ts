import type { SpawnOptions } from "./types"

export function cmdToDisplay({ cmd, args, cwd }: Pick<SpawnOptions, "cmd" | "args" | "cwd">) {
  const line = [cmd, ...args].map(quoteArg).join(" ")
  if (cwd) {
    return `\t${line}\n\t(cwd: ${cwd})`
  }
  return `\t${line}`
}

function quoteArg(arg: string) {
  return /[\s"']/.test(arg) ? JSON.stringify(arg) : arg
}
