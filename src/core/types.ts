/**
 * The implementation must work as a line oriented log sink (a terminal, a file, an editor panel)
 */
export interface OutputChannel {
  append (value: string): void
  appendLine (value: string): void
  clear (): void
  replace (value: string): void
}

export type StageName = "provision" | "assemble" | "deploy"

export type StageStatus = "started"
  | "passed"
  | "failed"
