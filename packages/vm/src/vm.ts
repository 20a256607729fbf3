import { Opcode, type Instruction, type InstructionSequence } from '@capiscript/compiler'
import { traceEnabled } from './env'
import { ExecutionError } from './errors'
import { done, fail, ok, type Result } from './result'
import VMStack from './stack'
import {
  asCallable,
  asIndexable,
  errorMessage,
  getField,
  setField,
  toResults,
  type Callable,
  type Indexable,
  type Value
} from './value'

export interface VMOptions {
  trace?: boolean // log every instruction and the stack after it
}

interface CallSite {
  fn: Value // checked by the caller, so pcall can protect the type check
  args: Value[]
}

const numberArg = (instruction: Instruction, index: number): Result<number> => {
  const arg = instruction.args[index]
  return typeof arg === 'number' ? ok(arg) : fail('malformed instruction')
}

const stringArg = (instruction: Instruction, index: number): Result<string> => {
  const arg = instruction.args[index]
  return typeof arg === 'string' ? ok(arg) : fail('malformed instruction')
}

const countArg = (instruction: Instruction, index: number): Result<number> => {
  const arg = numberArg(instruction, index)
  if (!arg.ok) return arg
  if (!Number.isInteger(arg.value) || arg.value < 0) return fail(`invalid count ${arg.value}`)
  return arg
}

const invoke = (callee: Callable, args: Value[]): Result<Value[]> => {
  try {
    return ok(toResults(callee(...args)))
  } catch (error) {
    return fail(String(errorMessage(error)), error)
  }
}

const pushResults = (stack: VMStack, values: Value[], count: number) => {
  for (let i = 0; i < count; i++) {
    stack.push(values[i] ?? null)
  }
}

export default class VM {
  private readonly ir: InstructionSequence
  private readonly environment: Indexable
  private readonly trace: boolean

  constructor(ir: InstructionSequence, environment: Indexable = {}, options: VMOptions = {}) {
    this.ir = ir
    this.environment = environment
    this.trace = options.trace ?? traceEnabled()
  }

  /**
   * Take the callable at -(nargs + 1) and its arguments off the stack
   */
  private popCallSite(stack: VMStack, nargs: number): Result<CallSite> {
    const fn = stack.get(-nargs - 1)
    if (!fn.ok) return fn

    const args: Value[] = []
    for (let i = nargs; i >= 1; i--) {
      const arg = stack.pop(-i)
      if (!arg.ok) return arg
      args.push(arg.value)
    }
    const removed = stack.pop(-1)
    if (!removed.ok) return removed
    return ok({ fn: fn.value, args })
  }

  private call(instruction: Instruction, stack: VMStack): Result<void> {
    const nargs = countArg(instruction, 0)
    if (!nargs.ok) return nargs
    const nresults = countArg(instruction, 1)
    if (!nresults.ok) return nresults

    const site = this.popCallSite(stack, nargs.value)
    if (!site.ok) return site
    const callee = asCallable(site.value.fn)
    if (!callee.ok) return callee
    const returned = invoke(callee.value, site.value.args)
    if (!returned.ok) return returned

    pushResults(stack, returned.value, nresults.value)
    return done
  }

  private protectedCall(instruction: Instruction, stack: VMStack): Result<void> {
    const nargs = countArg(instruction, 0)
    if (!nargs.ok) return nargs
    const nresults = countArg(instruction, 1)
    if (!nresults.ok) return nresults
    const errfunc = numberArg(instruction, 2)
    if (!errfunc.ok) return errfunc

    const site = this.popCallSite(stack, nargs.value)
    if (!site.ok) return site
    const callee = asCallable(site.value.fn)
    const returned = callee.ok ? invoke(callee.value, site.value.args) : fail(callee.error, callee.error)
    if (returned.ok) {
      pushResults(stack, returned.value, nresults.value)
      return done
    }

    const message = errorMessage(returned.cause)
    if (errfunc.value === 0) {
      stack.push(message)
      return done
    }

    // a fault inside the handler is not protected
    const handler = stack.get(errfunc.value)
    if (!handler.ok) return handler
    const handlerFn = asCallable(handler.value)
    if (!handlerFn.ok) return handlerFn
    const handled = invoke(handlerFn.value, [message])
    if (!handled.ok) return handled
    pushResults(stack, handled.value, 1)
    return done
  }

  private executeOpcode(instruction: Instruction, stack: VMStack): Result<void> {
    switch (instruction.opcode) {
      case Opcode.GET_GLOBAL: {
        const name = stringArg(instruction, 0)
        if (!name.ok) return name
        stack.push(getField(this.environment, name.value))
        return done
      }
      case Opcode.GET_FIELD: {
        const idx = numberArg(instruction, 0)
        if (!idx.ok) return idx
        const name = stringArg(instruction, 1)
        if (!name.ok) return name
        const value = stack.get(idx.value)
        if (!value.ok) return value
        const target = asIndexable(value.value)
        if (!target.ok) return target
        stack.push(getField(target.value, name.value))
        return done
      }
      case Opcode.SET_FIELD: {
        const idx = numberArg(instruction, 0)
        if (!idx.ok) return idx
        const name = stringArg(instruction, 1)
        if (!name.ok) return name
        // the target index refers to the stack before the value is popped
        const value = stack.get(idx.value)
        if (!value.ok) return value
        const target = asIndexable(value.value)
        if (!target.ok) return target
        const top = stack.pop(-1)
        if (!top.ok) return top
        setField(target.value, name.value, top.value)
        return done
      }
      case Opcode.PUSH_VALUE: {
        const idx = numberArg(instruction, 0)
        if (!idx.ok) return idx
        const value = stack.get(idx.value)
        if (!value.ok) return value
        stack.push(value.value)
        return done
      }
      case Opcode.PCALL:
        return this.protectedCall(instruction, stack)
      case Opcode.CALL:
        return this.call(instruction, stack)
      case Opcode.PUSH_NUMBER:
      case Opcode.PUSH_BOOLEAN:
      case Opcode.PUSH_STRING: {
        const literal = instruction.args[0]
        if (literal === undefined) return fail('malformed instruction')
        stack.push(literal)
        return done
      }
      case Opcode.PUSH_NIL:
        stack.push(null)
        return done
      case Opcode.SET_TOP: {
        const top = numberArg(instruction, 0)
        if (!top.ok) return top
        if (top.value === 0) {
          stack.clear()
          return done
        }
        return stack.setSize(top.value)
      }
      case Opcode.REMOVE: {
        const idx = numberArg(instruction, 0)
        if (!idx.ok) return idx
        const removed = stack.pop(idx.value)
        return removed.ok ? done : removed
      }
      case Opcode.POP: {
        const count = countArg(instruction, 0)
        if (!count.ok) return count
        for (let i = 0; i < count.value; i++) {
          const removed = stack.pop(-1)
          if (!removed.ok) return removed
        }
        return done
      }
      case Opcode.EMPTY_STACK:
        stack.clear()
        return done
      default: {
        const unknown: never = instruction.opcode
        return fail(`no opcode handler found for ${String(unknown)}`)
      }
    }
  }

  private step(instruction: Instruction, position: number, stack: VMStack) {
    let result: Result<void>
    try {
      result = this.executeOpcode(instruction, stack)
    } catch (error) {
      throw new ExecutionError(position, instruction.line, String(errorMessage(error)), error)
    }
    if (!result.ok) {
      throw new ExecutionError(position, instruction.line, result.error, result.cause)
    }
  }

  /**
   * Run the program on a fresh stack seeded with `args`
   * @return the stack contents, bottom to top
   */
  run(args: Value[] = []): Value[] {
    const stack = new VMStack()
    args.forEach(arg => stack.push(arg))

    this.ir.forEach((instruction, index) => {
      if (this.trace) console.log(`EXECUTING ${instruction.opcode} ${instruction.args.join(' ')}`.trimEnd())
      this.step(instruction, index + 1, stack)
      if (this.trace) stack.printStack()
    })

    return stack.values()
  }
}
