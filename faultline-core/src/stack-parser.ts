import { StackFrame, StackLineParser, StackLineParserFn, StackParser, StackTraceFormat } from './types'

export const STACKTRACE_FRAME_LIMIT = 50
// Longer lines are not stack frames, and backtracking on them can hang the parser
const MAX_LINE_LENGTH = 1024

const UNKNOWN_FUNCTION = '?'

const STACK_TRACE_FORMATS: StackTraceFormat[] = ['default', 'androidJava']

// "Namespace.Class:Method (System.String) (at Assets/Scripts/File.cs:12)", the location is optional
const MONO_FRAME_REGEXP = /^\s*([^\s(]+)\s*\(([^)]*)\)(?:\s+\(at (.+):(\d+)\))?\s*$/

// "    at fn (file:12:3)" or "    at file:12:3"
const V8_FRAME_REGEXP = /^\s*at (?:(.+?) \()?(.+?):(\d+):(\d+)\)?\s*$/

// "    at com.example.Class.method(File.java:12)", "(Native Method)" or "(Unknown Source)"
const JAVA_FRAME_REGEXP = /^\s*at\s+([^\s(]+)\((?:Native Method|Unknown Source|([^:()]+)(?::(\d+))?)\)\s*$/

export const monoStackLineParser: StackLineParserFn = (line) => {
  const match = MONO_FRAME_REGEXP.exec(line)
  if (!match) {
    return undefined
  }
  return frame(`${match[1]}(${match[2]})`, match[3], match[4])
}

export const v8StackLineParser: StackLineParserFn = (line) => {
  const match = V8_FRAME_REGEXP.exec(line)
  if (!match) {
    return undefined
  }
  const stackFrame = frame(match[1] || UNKNOWN_FUNCTION, match[2], match[3])
  stackFrame.columnNumber = parseInt(match[4], 10)
  return stackFrame
}

export const javaStackLineParser: StackLineParserFn = (line) => {
  const match = JAVA_FRAME_REGEXP.exec(line)
  if (!match) {
    return undefined
  }
  return frame(match[1], match[2], match[3])
}

function frame(method: string, file: string | undefined, lineNumber: string | undefined): StackFrame {
  const stackFrame: StackFrame = { method }
  if (file) {
    stackFrame.file = file
  }
  if (lineNumber) {
    stackFrame.lineNumber = parseInt(lineNumber, 10)
  }
  return stackFrame
}

/**
 * Builds a parser that tries each line against the line parsers registered for the requested format,
 * lowest priority number first. Lines no parser understands are dropped.
 */
export function createStackParser(parsers: Record<StackTraceFormat, StackLineParser[]>): StackParser {
  const sorted = new Map<StackTraceFormat, StackLineParserFn[]>()
  for (const format of STACK_TRACE_FORMATS) {
    sorted.set(format, [...parsers[format]].sort((a, b) => a[0] - b[0]).map((p) => p[1]))
  }

  return (stack: string, format: StackTraceFormat = 'default', skipFirstLines: number = 0): StackFrame[] => {
    const frames: StackFrame[] = []
    const lineParsers = sorted.get(format) ?? []
    const lines = stack.split('\n')

    for (let i = skipFirstLines; i < lines.length; i++) {
      const line = lines[i]
      if (line.length > MAX_LINE_LENGTH || line.trim().length === 0) {
        continue
      }

      for (const parser of lineParsers) {
        const parsed = parser(line)
        if (parsed) {
          frames.push(parsed)
          break
        }
      }

      if (frames.length >= STACKTRACE_FRAME_LIMIT) {
        break
      }
    }

    return frames
  }
}

export const defaultStackParser: StackParser = createStackParser({
  default: [
    [10, v8StackLineParser],
    [20, monoStackLineParser],
  ],
  androidJava: [[10, javaStackLineParser]],
})
