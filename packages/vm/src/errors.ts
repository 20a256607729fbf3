export class ExecutionError extends Error {
  readonly position: number // 1-based index into the instruction sequence
  readonly line: number
  readonly reason: string

  constructor(position: number, line: number, reason: string, cause?: unknown) {
    super(`line ${line}: execution error: ${reason}`, cause === undefined ? undefined : { cause })
    this.name = 'ExecutionError'
    this.position = position
    this.line = line
    this.reason = reason
  }
}
