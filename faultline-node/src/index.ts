export * from 'faultline-core'
export { Faultline } from './faultline-node'
export type { FaultlineOptions } from './faultline-node'
export { NodeExceptionSource } from './error-source'
export { getDeviceMetadata, getAppMetadata } from './device'
export { addUncaughtExceptionListener, addUnhandledRejectionListener, createUncaughtExceptionHandler } from './autocapture'
