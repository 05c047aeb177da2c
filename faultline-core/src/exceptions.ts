import { classifyHandledState } from './handled-state'
import { ExceptionRecord, ExceptionSource, ReportableExceptions, ReportingContext, StackFrame } from './types'

/**
 * Walks the cause graph of `root` and returns every exception in it, root first, depth first.
 *
 * An aggregate exception contributes each of its bundled exceptions (with their whole subtree) in order,
 * any other exception contributes its single inner exception. An exception reached along several paths is
 * emitted once per path. Walks without recursion, and skips an exception that is one of its own ancestors so a
 * cause cycle terminates.
 */
export function flattenExceptionTree<E>(root: E | null | undefined, source: ExceptionSource<E>): E[] {
  if (root === null || root === undefined) {
    return []
  }

  const flattened: E[] = []
  // ancestors of the exception being visited, root first
  const path: E[] = []
  const onPath = new Set<E>()
  const pending: { exception: E; depth: number }[] = [{ exception: root, depth: 0 }]

  while (pending.length > 0) {
    const next = pending.pop()
    if (next === undefined) {
      break
    }
    const { exception, depth } = next

    while (path.length > depth) {
      const left = path.pop()
      if (left !== undefined) {
        onPath.delete(left)
      }
    }
    if (onPath.has(exception)) {
      continue
    }
    path.push(exception)
    onPath.add(exception)
    flattened.push(exception)

    const bundled = source.bundledExceptions(exception)
    if (bundled !== undefined) {
      // pushed in reverse so the first bundled exception is visited next
      for (let i = bundled.length - 1; i >= 0; i--) {
        pending.push({ exception: bundled[i], depth: depth + 1 })
      }
      continue
    }

    const inner = source.innerException(exception)
    if (inner !== undefined) {
      pending.push({ exception: inner, depth: depth + 1 })
    }
  }

  return flattened
}

export function exceptionFromNative<E>(
  exception: E,
  source: ExceptionSource<E>,
  fallbackStackTrace: StackFrame[]
): ExceptionRecord {
  const frames = source.stackTrace(exception)

  return {
    errorClass: source.errorClass(exception),
    message: source.message(exception),
    stackTrace: frames.length > 0 ? frames : [...fallbackStackTrace],
  }
}

export function exceptionsFromNative<E>(
  root: E | null | undefined,
  source: ExceptionSource<E>,
  fallbackStackTrace: StackFrame[]
): ExceptionRecord[] {
  return flattenExceptionTree(root, source).map((exception) =>
    exceptionFromNative(exception, source, fallbackStackTrace)
  )
}

export function createReportableExceptions<E>(
  root: E | null | undefined,
  source: ExceptionSource<E>,
  fallbackStackTrace: StackFrame[],
  context: ReportingContext
): ReportableExceptions {
  return {
    exceptions: exceptionsFromNative(root, source, fallbackStackTrace),
    handledState: classifyHandledState(context),
  }
}
