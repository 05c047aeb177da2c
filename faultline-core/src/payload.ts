import { Session } from './session'
import { ExceptionPayload, ExceptionRecord, Report, ReportPayload, SessionPayload, StackFrame, StackFramePayload } from './types'

// The typed records are projected onto the wire field names here and nowhere else

function stackFrameToPayload(frame: StackFrame): StackFramePayload {
  const payload: StackFramePayload = { method: frame.method }
  if (frame.file !== undefined) {
    payload.file = frame.file
  }
  if (frame.lineNumber !== undefined) {
    payload.lineNumber = frame.lineNumber
  }
  if (frame.columnNumber !== undefined) {
    payload.columnNumber = frame.columnNumber
  }
  if (frame.inProject !== undefined) {
    payload.inProject = frame.inProject
  }
  return payload
}

export function exceptionToPayload(exception: ExceptionRecord): ExceptionPayload {
  return {
    errorClass: exception.errorClass,
    message: exception.message,
    stacktrace: exception.stackTrace.map(stackFrameToPayload),
  }
}

export function sessionToPayload(session: Session): SessionPayload {
  return session.toPayload()
}

export function reportToPayload(report: Report): ReportPayload {
  const payload: ReportPayload = {
    exceptions: report.exceptions.map(exceptionToPayload),
    severity: report.handledState.severity,
    unhandled: report.handledState.unhandled,
    severityReason: { ...report.handledState.severityReason },
    metaData: report.metadata,
    device: report.device,
    app: report.app,
  }
  if (report.context !== undefined) {
    payload.context = report.context
  }
  if (report.session) {
    payload.session = report.session
  }
  return payload
}
