type CaptureFn = (exception: unknown) => Promise<unknown>

/**
 * Reports the exception, lets the client flush, then exits with code 1 the way Node.js would have
 * without a listener.
 */
export function createUncaughtExceptionHandler(
  captureFn: CaptureFn,
  onFatalFn: () => Promise<void>,
  exit: (code: number) => void = (code) => process.exit(code)
): (error: Error) => Promise<void> {
  return async (error: Error): Promise<void> => {
    try {
      await captureFn(error)
      await onFatalFn()
    } catch (e) {
      console.error('[Faultline] Error while reporting an uncaught exception', e)
    } finally {
      exit(1)
    }
  }
}

export function addUncaughtExceptionListener(captureFn: CaptureFn, onFatalFn: () => Promise<void>): () => void {
  const handler = createUncaughtExceptionHandler(captureFn, onFatalFn)
  const listener = (error: Error): void => {
    handler(error).catch((e) => console.error('[Faultline] Uncaught exception handler failed', e))
  }
  process.on('uncaughtException', listener)
  return () => {
    process.off('uncaughtException', listener)
  }
}

export function addUnhandledRejectionListener(captureFn: CaptureFn): () => void {
  const listener = (reason: unknown): void => {
    captureFn(reason).catch((e) => console.error('[Faultline] Error while reporting an unhandled rejection', e))
  }
  process.on('unhandledRejection', listener)
  return () => {
    process.off('unhandledRejection', listener)
  }
}
