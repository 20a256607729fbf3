import { ArgKind, Header } from './constant'
import OpcodeRegistry, { registry as defaultRegistry } from './registry'
import type { Instruction, InstructionSequence, Literal } from './types'

export default class BytecodeCompiler {
  private readonly ir: InstructionSequence
  private readonly registry: OpcodeRegistry
  private readonly strings: string[]
  bytecode: Uint8Array

  constructor(ir: InstructionSequence, registry: OpcodeRegistry = defaultRegistry) {
    this.ir = ir
    this.registry = registry
    this.strings = []
    this.bytecode = new Uint8Array(0)
  }

  /**
   * Convert a non-negative integer to a little-endian byte array with length 8
   * used to store string pointers and source lines
   * @param long - the long number to convert
   * @return the byte array
   */
  private longToByteArray(long: number) {
    const byteArray = []
    for (let i = 0; i < 8; i++) {
      const byte = long & 0xff
      long = (long - byte) / 256
      byteArray.push(byte)
    }
    return byteArray
  }

  private doubleToByteArray(value: number) {
    const view = new DataView(new ArrayBuffer(8))
    view.setFloat64(0, value, true)
    return Array.from(new Uint8Array(view.buffer))
  }

  private stringPointer(value: string) {
    let pointer = this.strings.indexOf(value)
    if (pointer === -1) {
      this.strings.push(value)
      pointer = this.strings.length - 1
    }
    return pointer
  }

  private compileInstructionArgument(kind: ArgKind, arg: Literal | undefined): number[] {
    if (kind === ArgKind.NUMBER && typeof arg === 'number') {
      return [Header.LOAD_NUMBER, ...this.doubleToByteArray(arg)]
    }
    if (kind === ArgKind.STRING && typeof arg === 'string') {
      return [Header.LOAD_STRING, ...this.longToByteArray(this.stringPointer(arg))]
    }
    if (kind === ArgKind.BOOLEAN && typeof arg === 'boolean') {
      return [arg ? Header.LOAD_TRUE : Header.LOAD_FALSE]
    }
    throw new TypeError(`Expected ${kind} argument, got ${typeof arg}`)
  }

  private compileInstruction(instruction: Instruction, bytes: number[]) {
    const definition = this.registry.definition(instruction.opcode)
    bytes.push(definition.id, ...this.longToByteArray(instruction.line))
    definition.args.forEach((kind, index) => {
      bytes.push(...this.compileInstructionArgument(kind, instruction.args[index]))
    })
  }

  compile(): { bytecode: Uint8Array; strings: string[] } {
    const bytes: number[] = []
    this.ir.forEach(instruction => this.compileInstruction(instruction, bytes))
    this.bytecode = Uint8Array.from(bytes)

    return {
      bytecode: this.bytecode,
      strings: this.strings
    }
  }
}
