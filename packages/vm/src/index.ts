import { decode, type BytecodeBundle, type InstructionSequence } from '@capiscript/compiler'
import VM, { type VMOptions } from './vm'
import type { Indexable, Value } from './value'

export type Program = (...args: Value[]) => Value[]

/**
 * Bind a parsed sequence and an environment into a reusable program.
 * Every call runs on its own stack and returns what is left on it.
 */
const wrap = (ir: InstructionSequence, environment: Indexable = {}, options: VMOptions = {}): Program => {
  const vm = new VM(ir, environment, options)
  return (...args) => vm.run(args)
}

const load = (bundle: BytecodeBundle, environment: Indexable = {}, options: VMOptions = {}): Program =>
  wrap(decode(bundle), environment, options)

export { wrap, load }
export { VM, type VMOptions }
export { default as VMStack } from './stack'
export { ExecutionError } from './errors'
export { Results, results, typeName } from './value'
export type { Callable, Indexable, Nil, Value } from './value'
export type { Failure, Ok, Result } from './result'
