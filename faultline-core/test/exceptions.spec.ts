import {
  createReportableExceptions,
  exceptionsFromNative,
  flattenExceptionTree,
} from '../src/exceptions'
import { StackFrame } from '../src/types'
import { TestException, testException, testExceptionSource } from './test-utils/FaultlineCoreTestClient'

const fallback: StackFrame[] = [
  { method: 'Reporter.report()', file: 'reporter.ts', lineNumber: 10 },
  { method: 'Main.run()', file: 'main.ts', lineNumber: 3 },
]

const names = (exceptions: TestException[]): string[] => exceptions.map((e) => e.name)

describe('exceptions', () => {
  describe('flattenExceptionTree', () => {
    it('should return nothing for a missing root', () => {
      expect(flattenExceptionTree(null, testExceptionSource)).toEqual([])
      expect(flattenExceptionTree(undefined, testExceptionSource)).toEqual([])
    })

    it('should return a single exception without a cause', () => {
      expect(names(flattenExceptionTree(testException('A'), testExceptionSource))).toEqual(['A'])
    })

    it('should follow a cause chain root first', () => {
      const root = testException('A', { cause: testException('B', { cause: testException('C') }) })
      expect(names(flattenExceptionTree(root, testExceptionSource))).toEqual(['A', 'B', 'C'])
    })

    it('should visit bundled exceptions in order', () => {
      const root = testException('A', { bundle: [testException('X'), testException('Y')] })
      expect(names(flattenExceptionTree(root, testExceptionSource))).toEqual(['A', 'X', 'Y'])
    })

    it('should emit the whole subtree of a bundled exception before the next one', () => {
      const root = testException('A', {
        bundle: [
          testException('X', { cause: testException('X1', { cause: testException('X2') }) }),
          testException('Y', { bundle: [testException('Y1'), testException('Y2')] }),
          testException('Z'),
        ],
      })
      expect(names(flattenExceptionTree(root, testExceptionSource))).toEqual([
        'A',
        'X',
        'X1',
        'X2',
        'Y',
        'Y1',
        'Y2',
        'Z',
      ])
    })

    it('should ignore the cause of an aggregate exception', () => {
      const root = testException('A', { bundle: [testException('X')], cause: testException('B') })
      expect(names(flattenExceptionTree(root, testExceptionSource))).toEqual(['A', 'X'])
    })

    it('should treat an empty bundle as an aggregate without children', () => {
      expect(names(flattenExceptionTree(testException('A', { bundle: [] }), testExceptionSource))).toEqual(['A'])
    })

    it('should stop at a cause cycle', () => {
      const a = testException('A')
      const b = testException('B', { cause: a })
      a.cause = b
      expect(names(flattenExceptionTree(a, testExceptionSource))).toEqual(['A', 'B'])
    })

    it('should stop at an aggregate that bundles itself', () => {
      const a = testException('A')
      a.bundle = [testException('X'), a]
      expect(names(flattenExceptionTree(a, testExceptionSource))).toEqual(['A', 'X'])
    })

    it('should keep every entry of a bundle that repeats an exception', () => {
      const x = testException('X')
      const root = testException('A', { bundle: [x, x] })
      expect(names(flattenExceptionTree(root, testExceptionSource))).toEqual(['A', 'X', 'X'])
    })

    it('should emit a shared cause under each exception that has it', () => {
      const shared = testException('S', { cause: testException('T') })
      const root = testException('A', {
        bundle: [testException('X', { cause: shared }), testException('Y', { cause: shared })],
      })
      expect(names(flattenExceptionTree(root, testExceptionSource))).toEqual(['A', 'X', 'S', 'T', 'Y', 'S', 'T'])
    })

    it('should handle very deep cause chains', () => {
      let root = testException('E0')
      for (let i = 1; i <= 100000; i++) {
        root = testException(`E${i}`, { cause: root })
      }
      const flattened = flattenExceptionTree(root, testExceptionSource)
      expect(flattened.length).toEqual(100001)
      expect(flattened[0].name).toEqual('E100000')
      expect(flattened[100000].name).toEqual('E0')
    })
  })

  describe('exceptionsFromNative', () => {
    it('should use the exception type name and message', () => {
      const frames = [{ method: 'Thrower.throw()', file: 'thrower.ts', lineNumber: 7 }]
      const records = exceptionsFromNative(
        testException('NullReferenceException', { message: 'Object reference not set', frames }),
        testExceptionSource,
        fallback
      )
      expect(records).toEqual([
        { errorClass: 'NullReferenceException', message: 'Object reference not set', stackTrace: frames },
      ])
    })

    it('should use the fallback stack trace frame for frame when an exception has none', () => {
      const [record] = exceptionsFromNative(testException('A'), testExceptionSource, fallback)
      expect(record.stackTrace).toEqual(fallback)
      expect(record.stackTrace).not.toBe(fallback)
    })

    it('should fall back per record in a cause chain', () => {
      const ownFrames = [{ method: 'B.run()', file: 'b.ts', lineNumber: 2 }]
      const root = testException('A', { cause: testException('B', { frames: ownFrames }) })
      const records = exceptionsFromNative(root, testExceptionSource, fallback)
      expect(records.map((r) => r.stackTrace)).toEqual([fallback, ownFrames])
    })

    it('should produce an empty stack trace when the fallback is empty too', () => {
      const [record] = exceptionsFromNative(testException('A'), testExceptionSource, [])
      expect(record.stackTrace).toEqual([])
    })

    it('should allow an empty message', () => {
      const [record] = exceptionsFromNative(testException('A', { message: '' }), testExceptionSource, [])
      expect(record.message).toEqual('')
    })
  })

  describe('createReportableExceptions', () => {
    it('should share one handled state across the flattened set', () => {
      const root = testException('A', { cause: testException('B') })
      const reportable = createReportableExceptions(root, testExceptionSource, fallback, {
        type: 'unhandledException',
      })
      expect(reportable.exceptions.map((e) => e.errorClass)).toEqual(['A', 'B'])
      expect(reportable.handledState).toEqual({
        unhandled: true,
        severity: 'error',
        severityReason: { type: 'unhandledException' },
      })
    })

    it('should return no exceptions for a missing root', () => {
      const reportable = createReportableExceptions(null, testExceptionSource, fallback, { type: 'handledException' })
      expect(reportable.exceptions).toEqual([])
    })
  })
})
