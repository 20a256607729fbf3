import type { Opcode } from './constant'

export type Literal = number | string | boolean

/**
 * One parsed operation
 * @example { opcode: Opcode.PUSH_NUMBER, args: [42], line: 1 }
 */
export interface Instruction {
  readonly opcode: Opcode
  readonly args: readonly Literal[]
  readonly line: number // source line, used in error messages
}

export type InstructionSequence = readonly Instruction[]

/**
 * Assembled program: a zlib stream in base64 plus the string table it points into
 */
export interface BytecodeBundle {
  bytecode: string
  strings: string[]
}
