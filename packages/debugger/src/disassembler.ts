import { BytecodeLoader, registry, type BytecodeBundle, type Instruction, type Literal } from '@capiscript/compiler'

export default class Disassembler {
  private readonly ir: Instruction[]
  private result: string

  constructor(bundle: BytecodeBundle) {
    this.ir = new BytecodeLoader(bundle).start()
    this.result = ''
  }

  private formatValue(value: Literal) {
    if (typeof value === 'number') {
      if (Object.is(value, -0)) return '-0'
      // overflows to the same infinity when parsed again
      if (value === Infinity) return '1e999'
      if (value === -Infinity) return '-1e999'
    }
    return String(value)
  }

  private disassemble(instruction: Instruction) {
    const { mnemonic } = registry.definition(instruction.opcode)
    this.log([mnemonic, ...instruction.args.map(arg => this.formatValue(arg))].join(' ').trimEnd())
  }

  private log(message: string) {
    this.result += `${message}\n`
  }

  start() {
    this.result = ''
    this.ir.forEach(instruction => this.disassemble(instruction))
    return this.result
  }
}
