import { ExceptionSource, StackFrame, StackParser, defaultStackParser, utils } from 'faultline-core'

const { isError, isPlainObject } = utils

/**
 * Reads JavaScript values thrown or rejected in Node.js. `cause` is the inner exception and an
 * `AggregateError` (or any error carrying an `errors` array) bundles its `errors`.
 */
export class NodeExceptionSource implements ExceptionSource<unknown> {
  constructor(private readonly stackParser: StackParser = defaultStackParser) {}

  errorClass(exception: unknown): string {
    if (isError(exception)) {
      return exception.name || exception.constructor.name || 'Error'
    }
    return 'Error'
  }

  message(exception: unknown): string {
    if (isError(exception)) {
      return exception.message
    }
    if (isPlainObject(exception) && typeof exception.message === 'string') {
      return exception.message
    }
    return String(exception)
  }

  stackTrace(exception: unknown): StackFrame[] {
    if (!isError(exception) || !exception.stack) {
      return []
    }
    return this.stackParser(exception.stack, 'default', headerLineCount(exception))
  }

  innerException(exception: unknown): unknown | undefined {
    if (!isError(exception) || exception.cause === null) {
      return undefined
    }
    return exception.cause
  }

  bundledExceptions(exception: unknown): unknown[] | undefined {
    if (isError(exception) && 'errors' in exception && Array.isArray(exception.errors)) {
      return [...exception.errors]
    }
    return undefined
  }
}

const FRAME_LINE_REGEXP = /^\s*at /

// V8 stacks start with a "Name: message" header that spans as many lines as the message. The name there can
// differ from `error.name` (a `name` class field is set after the stack is captured), so the header ends at the message
function headerLineCount(error: Error): number {
  const stack = error.stack ?? ''
  const messageAt = error.message ? stack.indexOf(error.message) : -1
  if (messageAt >= 0) {
    return stack.slice(0, messageAt + error.message.length).split('\n').length
  }
  return FRAME_LINE_REGEXP.test(stack.split('\n')[0]) ? 0 : 1
}
