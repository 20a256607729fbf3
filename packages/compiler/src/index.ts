import { zlibSync } from 'fflate'
import { fromUint8Array } from 'js-base64'
import Parser from './parser'
import BytecodeCompiler from './assembler'
import BytecodeLoader from './loader'
import type { BytecodeBundle, InstructionSequence } from './types'

const parse = (source: string): InstructionSequence => {
  const parser = new Parser(source)
  return Object.freeze(parser.parse())
}

const assemble = (ir: InstructionSequence): BytecodeBundle => {
  const bytecodeCompiler = new BytecodeCompiler(ir)
  const { bytecode, strings } = bytecodeCompiler.compile()
  return {
    bytecode: fromUint8Array(zlibSync(bytecode)),
    strings
  }
}

const decode = (bundle: BytecodeBundle): InstructionSequence => {
  const loader = new BytecodeLoader(bundle)
  return Object.freeze(loader.start())
}

export { parse, assemble, decode }
export { Parser, BytecodeCompiler, BytecodeLoader }
export { default as OpcodeRegistry, registry } from './registry'
export type { OpcodeDefinition } from './registry'
export { ArgKind, Header, Opcode } from './constant'
export { ParseError, BytecodeError } from './errors'
export { toNumber } from './number'
export type { BytecodeBundle, Instruction, InstructionSequence, Literal } from './types'
