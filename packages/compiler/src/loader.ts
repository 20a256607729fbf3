import { unzlibSync } from 'fflate'
import { toUint8Array } from 'js-base64'
import { ArgKind, Header } from './constant'
import { BytecodeError } from './errors'
import OpcodeRegistry, { registry as defaultRegistry } from './registry'
import type { BytecodeBundle, Instruction, Literal } from './types'

export default class BytecodeLoader {
  private readonly bytecode: Uint8Array
  private readonly strings: string[]
  private readonly registry: OpcodeRegistry
  private programCounter: number

  constructor(bundle: BytecodeBundle, registry: OpcodeRegistry = defaultRegistry) {
    this.bytecode = this.decodeBytecode(bundle.bytecode)
    this.strings = bundle.strings
    this.registry = registry
    this.programCounter = 0
  }

  private decodeBytecode(bytecode: string): Uint8Array {
    try {
      return unzlibSync(toUint8Array(bytecode))
    } catch (error) {
      throw new BytecodeError(0, `corrupted bytecode: ${error instanceof Error ? error.message : String(error)}`)
    }
  }

  private byteArrayToLong(byteArray: Uint8Array): number {
    byteArray.reverse()
    return byteArray.reduce((previous, current) => previous * 256 + current, 0)
  }

  private load8ByteArray(): Uint8Array {
    if (this.programCounter + 8 > this.bytecode.length) {
      throw new BytecodeError(this.programCounter, 'unexpected end of bytecode')
    }
    const byteArray = this.bytecode.slice(this.programCounter, this.programCounter + 8)
    this.programCounter += 8
    return byteArray
  }

  private loadDouble(): number {
    const bytes = this.load8ByteArray()
    return new DataView(bytes.buffer, bytes.byteOffset, 8).getFloat64(0, true)
  }

  private loadByte(): number {
    if (this.programCounter >= this.bytecode.length) {
      throw new BytecodeError(this.programCounter, 'unexpected end of bytecode')
    }
    return this.bytecode[this.programCounter++]
  }

  private getValue(kind: ArgKind): Literal {
    const offset = this.programCounter
    const header = this.loadByte()

    switch (header) {
      case Header.LOAD_NUMBER:
        if (kind === ArgKind.NUMBER) return this.loadDouble()
        break
      case Header.LOAD_STRING:
        if (kind === ArgKind.STRING) {
          const pointer = this.byteArrayToLong(this.load8ByteArray())
          if (pointer >= this.strings.length) {
            throw new BytecodeError(offset, `string pointer ${pointer} out of range`)
          }
          return this.strings[pointer]
        }
        break
      case Header.LOAD_TRUE:
        if (kind === ArgKind.BOOLEAN) return true
        break
      case Header.LOAD_FALSE:
        if (kind === ArgKind.BOOLEAN) return false
        break
      default:
        throw new BytecodeError(offset, `unknown header ${header}`)
    }
    throw new BytecodeError(offset, `unexpected header ${header} for ${kind} argument`)
  }

  private loadInstruction(): Instruction {
    const offset = this.programCounter
    const id = this.loadByte()
    const definition = this.registry.fromId(id)
    if (!definition) throw new BytecodeError(offset, `unknown opcode ${id}`)

    const line = this.byteArrayToLong(this.load8ByteArray())
    const args = definition.args.map(kind => this.getValue(kind))
    return Object.freeze({ opcode: definition.opcode, args: Object.freeze(args), line })
  }

  start(): Instruction[] {
    const ir: Instruction[] = []
    this.programCounter = 0
    while (this.programCounter < this.bytecode.length) {
      ir.push(this.loadInstruction())
    }
    return ir
  }
}
