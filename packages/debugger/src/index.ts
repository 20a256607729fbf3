import type { BytecodeBundle } from '@capiscript/compiler'
import Disassembler from './disassembler'

const disassemble = (bundle: BytecodeBundle) => {
  const worker = new Disassembler(bundle)
  return worker.start()
}

export { disassemble, Disassembler }
