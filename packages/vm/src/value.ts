import { fail, ok, type Result } from './result'

export type Nil = null

/**
 * Host function. Return a single value, nothing, or several values via `results()`
 */
export type Callable = (...args: Value[]) => Value | Results | void

/**
 * Host object whose string keys hold values
 */
export interface Indexable {
  [field: string]: Value
}

export type Value = number | string | boolean | Nil | Callable | Indexable

export class Results {
  readonly values: Value[]

  constructor(values: Value[]) {
    this.values = values
  }
}

export const results = (...values: Value[]) => new Results(values)

export const typeName = (value: Value): string => {
  if (value === null) return 'nil'
  switch (typeof value) {
    case 'function':
      return 'function'
    case 'object':
      return 'table'
    default:
      return typeof value
  }
}

export const asCallable = (value: Value): Result<Callable> =>
  typeof value === 'function' ? ok(value) : fail(`attempt to call a ${typeName(value)} value`)

export const asIndexable = (value: Value): Result<Indexable> =>
  typeof value === 'object' && value !== null ? ok(value) : fail(`attempt to index a ${typeName(value)} value`)

/**
 * Read an own field, anything else is nil
 */
export const getField = (target: Indexable, field: string): Value => {
  if (!Object.prototype.hasOwnProperty.call(target, field)) return null
  return target[field] ?? null
}

// defineProperty stores `__proto__` as a plain field instead of swapping the prototype
export const setField = (target: Indexable, field: string, value: Value) => {
  Object.defineProperty(target, field, { value, writable: true, enumerable: true, configurable: true })
}

/**
 * Normalize whatever a host callable returned into a list of values
 */
export const toResults = (returned: Value | Results | void): Value[] => {
  if (returned instanceof Results) return returned.values
  return isValue(returned) ? [returned] : []
}

const isValue = (returned: unknown): returned is Value => returned !== undefined

/**
 * Message carried by a fault raised inside a protected call
 */
export const errorMessage = (error: unknown): Value => {
  if (error instanceof Error) return error.message
  if (error === null || typeof error === 'string' || typeof error === 'number' || typeof error === 'boolean') {
    return error
  }
  return String(error)
}

export const describe = (value: Value): string => {
  switch (typeof value) {
    case 'string':
      return JSON.stringify(value)
    case 'function':
      return 'function'
    case 'object':
      return value === null ? 'nil' : 'table'
    default:
      return String(value)
  }
}
