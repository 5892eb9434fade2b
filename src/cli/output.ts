import type { OutputChannel } from "../core/types"

/**
 * OutputChannel over a terminal stream. stderr by default: stdout belongs to the emulator's serial console
 */
export class TerminalOutputChannel implements OutputChannel {
  constructor (private readonly stream: NodeJS.WritableStream = process.stderr) {}

  append (value: string): void {
    this.stream.write(value)
  }

  appendLine (value: string): void {
    this.stream.write(value.concat("\n"))
  }

  clear (): void {
    // a terminal keeps its scrollback
  }

  replace (value: string): void {
    this.append(value)
  }
}

export function createTerminalOutputChannel (stream?: NodeJS.WritableStream) {
  return new TerminalOutputChannel(stream)
}
