/**
 * Sleep utilities for the background poll task
 */

function abortError(): Error {
  const error = new Error('Sleep aborted')
  error.name = 'AbortError'
  return error
}

/**
 * Sleep with cancellation support via AbortSignal
 * @returns Promise that resolves after delay or rejects if aborted
 */
export async function sleepWithAbort(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    throw abortError()
  }

  if (ms <= 0) {
    return Promise.resolve()
  }

  return new Promise<void>((resolve, reject) => {
    let timeoutId: ReturnType<typeof setTimeout>

    const abortHandler = () => {
      clearTimeout(timeoutId)
      reject(abortError())
    }

    if (signal) {
      signal.addEventListener('abort', abortHandler, { once: true })
    }

    timeoutId = setTimeout(() => {
      if (signal) {
        signal.removeEventListener('abort', abortHandler)
      }
      resolve()
    }, ms)
  })
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError'
}
