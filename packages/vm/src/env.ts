// Cached environment feature flags for the VM.
let _trace: boolean | undefined
export function traceEnabled(): boolean {
  if (_trace === undefined) {
    const v = (process.env.CAPISCRIPT_TRACE || '').toLowerCase()
    _trace = v === '1' || v === 'true'
  }
  return _trace
}

// For tests only: reset the cached flag.
export function __resetEnvCacheForTests__() {
  _trace = undefined
}
