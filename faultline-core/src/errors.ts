export class FaultlineDeliveryError extends Error {
  name = 'FaultlineDeliveryError'

  constructor(public error: unknown) {
    super('Error while delivering a Faultline report', error instanceof Error ? { cause: error } : {})
  }
}

export class FaultlineValidationError extends Error {
  name = 'FaultlineValidationError'

  constructor(message: string) {
    super(message)
  }
}
