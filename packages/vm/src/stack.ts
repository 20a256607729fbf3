import { done, fail, ok, type Result } from './result'
import { describe, type Value } from './value'

export default class VMStack {
  private stack: Value[] = []

  get size() {
    return this.stack.length
  }

  /**
   * Resolve a 1-based index, negative values count from the top
   * @return the 0-based slot
   */
  private resolve(idx: number): Result<number> {
    if (!Number.isInteger(idx)) return fail(`invalid stack index ${idx}`)
    const position = idx < 0 ? this.stack.length + 1 + idx : idx
    if (position < 1 || position > this.stack.length) {
      return fail(`stack index ${idx} out of range (size ${this.stack.length})`)
    }
    return ok(position - 1)
  }

  printStack() {
    console.log(`[${this.stack.map(describe).join(', ')}]`)
  }

  push(value: Value) {
    this.stack.push(value)
  }

  get(idx: number): Result<Value> {
    const slot = this.resolve(idx)
    if (!slot.ok) return slot
    return ok(this.stack[slot.value])
  }

  pop(idx = -1): Result<Value> {
    const slot = this.resolve(idx)
    if (!slot.ok) return slot
    const [value] = this.stack.splice(slot.value, 1)
    return ok(value)
  }

  clear() {
    this.stack = []
  }

  /**
   * Truncate or grow the stack, new slots hold nil
   */
  setSize(size: number): Result<void> {
    if (!Number.isInteger(size)) return fail(`invalid stack size ${size}`)
    const target = size < 0 ? this.stack.length + 1 + size : size
    if (target < 0) return fail(`stack size ${size} out of range (size ${this.stack.length})`)
    while (this.stack.length < target) this.stack.push(null)
    this.stack.length = target
    return done
  }

  values(): Value[] {
    return [...this.stack]
  }
}
