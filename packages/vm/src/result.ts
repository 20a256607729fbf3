export interface Ok<T> {
  ok: true
  value: T
}

export interface Failure {
  ok: false
  error: string
  cause?: unknown // host error, when one was thrown
}

export type Result<T> = Ok<T> | Failure

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value })

export const done: Ok<void> = { ok: true, value: undefined }

export const fail = (error: string, cause?: unknown): Failure =>
  cause === undefined ? { ok: false, error } : { ok: false, error, cause }
