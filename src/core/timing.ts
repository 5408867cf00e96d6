import { AbortOperationError } from './errors.ts'

/** Waits `ms` milliseconds. Rejects with AbortOperationError as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortOperationError())
      return
    }

    let onAbort: (() => void) | undefined

    const timeoutId = setTimeout(() => {
      if (onAbort) signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)

    if (signal) {
      onAbort = () => {
        clearTimeout(timeoutId)
        reject(new AbortOperationError())
      }
      signal.addEventListener('abort', onAbort, { once: true })
    }
  })
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw new AbortOperationError()
}
