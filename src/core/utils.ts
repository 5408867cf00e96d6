import { ConfigurationError } from './errors.ts'

export function normalizeBaseUrl(url: string): string {
  return url.replace(/\/+$/, '')
}

export function resolveFetch(override?: typeof fetch): typeof fetch {
  const resolved: typeof fetch | undefined = override ?? globalThis.fetch
  if (!resolved) {
    throw new ConfigurationError(
      'No fetch implementation available. Provide a fetchImplementation option or use Node.js >= 20.',
    )
  }
  return resolved
}

/** Aborts after `timeoutMs` or when `outerSignal` aborts. Leaves no listener on `outerSignal`. */
export function createTimeoutSignal(
  timeoutMs: number,
  outerSignal?: AbortSignal,
): { signal: AbortSignal; timeoutSignal: AbortSignal; cleanup: () => void } {
  const controller = new AbortController()
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs)
  timeoutId.unref()
  const signal = outerSignal ? AbortSignal.any([controller.signal, outerSignal]) : controller.signal
  return { signal, timeoutSignal: controller.signal, cleanup: () => clearTimeout(timeoutId) }
}

/** Resolves once the promise settles, whichever way. */
export function settled(promise: Promise<unknown>): Promise<void> {
  return promise.then(
    () => undefined,
    () => undefined,
  )
}

export function validateRequiredStrings<T extends object>(
  options: T,
  keys: Array<keyof T & string>,
): void {
  for (const key of keys) {
    const value: unknown = options[key]
    if (!value || typeof value !== 'string') {
      throw new ConfigurationError(`${key} must be a non-empty string`)
    }
  }
}

export function validatePositiveNumber(name: string, value: number | undefined): void {
  if (value === undefined) return
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive number`)
  }
}

export function validateNonNegativeNumber(name: string, value: number | undefined): void {
  if (value === undefined) return
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative number`)
  }
}

export function validateUrl(name: string, value: string): void {
  try {
    new URL(value)
  } catch {
    throw new ConfigurationError(`Invalid ${name}: "${value}"`)
  }
}
