/** The schema passed to `defineState` cannot be built. Fatal for room creation. */
export class SchemaError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SchemaError'
  }
}

/** A replication policy threw or produced a value that cannot be replicated. */
export class PolicyError extends Error {
  readonly field: string

  constructor(field: string, message: string, options?: { cause?: unknown }) {
    super(`Policy for field "${field}" failed: ${message}`, options)
    this.name = 'PolicyError'
    this.field = field
  }
}

/** A path does not address a location in the state schema. */
export class PathError extends Error {
  readonly path: string

  constructor(path: string, message: string) {
    super(`Invalid path "${path}": ${message}`)
    this.name = 'PathError'
    this.path = path
  }
}

/** A decoder met a slot reference that was never defined in its scope. */
export class StaleSlotError extends Error {
  readonly slot: number

  constructor(slot: number, scope: string) {
    super(`Unknown dynamic key slot ${slot} in ${scope} scope`)
    this.name = 'StaleSlotError'
    this.slot = slot
  }
}
