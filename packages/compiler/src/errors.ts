export class ParseError extends Error {
  readonly line: number
  readonly reason: string

  constructor(line: number, reason: string) {
    super(`line ${line}: ${reason}`)
    this.name = 'ParseError'
    this.line = line
    this.reason = reason
  }
}

export class BytecodeError extends Error {
  readonly offset: number

  constructor(offset: number, reason: string) {
    super(`offset ${offset}: ${reason}`)
    this.name = 'BytecodeError'
    this.offset = offset
  }
}
