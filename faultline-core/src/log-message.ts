import { handledStateForLogMessage, handledStateForUnhandledException } from './handled-state'
import {
  ExceptionRecord,
  HandledState,
  LogConvention,
  LogMessage,
  Severity,
  StackFrame,
  StackParser,
  StackTraceFormat,
} from './types'

const ERROR_CLASS_MESSAGE_PATTERN = /^(\S+):\s*(.*)/s

/**
 * Uncaught Java exceptions are written to the log as `AndroidJavaException: java.lang.Class: description`,
 * with a Java formatted stack trace.
 */
export const androidJavaLogConvention: LogConvention = {
  syntheticErrorClassPrefix: 'Log',
  wrappedExceptionClass: 'AndroidJavaException',
  nativeAgentMarker: 'libfaultline',
  wrappedStackTraceFormat: 'androidJava',
}

export interface LogMessageOptions {
  stackParser: StackParser
  forceUnhandled?: boolean
  convention?: LogConvention
}

export interface ClassifiedLogMessage {
  exception: ExceptionRecord
  handledState: HandledState
}

function matchErrorClass(text: string): { errorClass: string; message: string } | undefined {
  const match = ERROR_CLASS_MESSAGE_PATTERN.exec(text)
  if (!match) {
    return undefined
  }
  return { errorClass: match[1], message: match[2].trim() }
}

function resolveStackTrace(
  logMessage: LogMessage,
  stackParser: StackParser,
  format: StackTraceFormat,
  fallbackStackTrace: StackFrame[]
): StackFrame[] {
  const frames = stackParser(logMessage.stackTrace, format)
  return frames.length > 0 ? frames : [...fallbackStackTrace]
}

export function exceptionFromLogMessage(
  logMessage: LogMessage,
  fallbackStackTrace: StackFrame[],
  severity: Severity,
  options: LogMessageOptions
): ClassifiedLogMessage {
  const convention = options.convention ?? androidJavaLogConvention
  const forcedState = options.forceUnhandled ? handledStateForUnhandledException() : undefined
  const match = matchErrorClass(logMessage.condition)

  if (!match) {
    return {
      exception: {
        errorClass: `${convention.syntheticErrorClassPrefix}${logMessage.type}`,
        message: logMessage.condition,
        stackTrace: resolveStackTrace(logMessage, options.stackParser, 'default', fallbackStackTrace),
      },
      handledState: forcedState ?? handledStateForLogMessage(severity),
    }
  }

  if (match.errorClass !== convention.wrappedExceptionClass) {
    return {
      exception: {
        errorClass: match.errorClass,
        message: match.message,
        stackTrace: resolveStackTrace(logMessage, options.stackParser, 'default', fallbackStackTrace),
      },
      handledState: forcedState ?? handledStateForLogMessage(severity),
    }
  }

  // A wrapped native exception is always an unhandled crash of the native runtime
  const nested = matchErrorClass(match.message)
  return {
    exception: {
      // without a nested description the message holds nothing but the native class name
      errorClass: nested ? nested.errorClass : match.message,
      message: nested ? nested.message : '',
      stackTrace: resolveStackTrace(
        logMessage,
        options.stackParser,
        convention.wrappedStackTraceFormat,
        fallbackStackTrace
      ),
    },
    handledState: handledStateForUnhandledException(),
  }
}

/**
 * Whether a log message should be reported at all. Wrapped native exceptions whose stack trace shows the native
 * agent already reported them are dropped, so the same crash is not sent twice.
 */
export function shouldSend(logMessage: LogMessage, convention: LogConvention = androidJavaLogConvention): boolean {
  const match = matchErrorClass(logMessage.condition)
  if (match && match.errorClass === convention.wrappedExceptionClass) {
    return !logMessage.stackTrace || !logMessage.stackTrace.includes(convention.nativeAgentMarker)
  }
  return true
}
