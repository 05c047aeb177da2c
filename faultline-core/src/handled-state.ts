import { HandledState, LogType, ReportingContext, Severity } from './types'

const DEFAULT_HANDLED_SEVERITY: Severity = 'warning'

export function handledStateForHandledException(severity?: Severity): HandledState {
  if (severity === undefined) {
    return freeze(false, DEFAULT_HANDLED_SEVERITY, { type: 'handledException' })
  }
  return freeze(false, severity, { type: 'userSpecifiedSeverity' })
}

export function handledStateForLogMessage(severity: Severity): HandledState {
  return freeze(severity === 'error', severity, { type: 'log', attributes: { level: severity } })
}

export function handledStateForUnhandledException(): HandledState {
  return freeze(true, 'error', { type: 'unhandledException' })
}

export function classifyHandledState(context: ReportingContext): HandledState {
  switch (context.type) {
    case 'handledException':
      return handledStateForHandledException(context.severity)
    case 'logMessage':
      return handledStateForLogMessage(context.severity)
    case 'unhandledException':
      return handledStateForUnhandledException()
  }
}

export function severityForLogType(type: LogType): Severity {
  switch (type) {
    case 'Exception':
    case 'Error':
    case 'Assert':
      return 'error'
    case 'Warning':
      return 'warning'
    case 'Log':
      return 'info'
  }
}

function freeze(unhandled: boolean, severity: Severity, severityReason: HandledState['severityReason']): HandledState {
  return Object.freeze({ unhandled, severity, severityReason: Object.freeze(severityReason) })
}
