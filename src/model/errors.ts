/**
 * Error taxonomy for the setup-parameter engine.
 *
 * Soft numeric failures (unparseable text, zero or missing denominators,
 * absent optional inputs) are not errors: they resolve to `null`.
 */

export class SetupParamError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/** A lookup or explanation asked for a key the active catalog does not define. */
export class UnknownFieldError extends SetupParamError {
  constructor(
    readonly key: string,
    readonly catalog: string,
  ) {
    super(`Unknown field "${key}" in ${catalog} catalog`)
  }
}

/** Catalog defect found at construction time. Fatal at startup. */
export class CatalogError extends SetupParamError {
  constructor(
    readonly catalog: string,
    readonly problems: string[],
  ) {
    super(`Invalid ${catalog} catalog: ${problems.join('; ')}`)
  }
}

export class UnsupportedSetupParamTypeError extends SetupParamError {
  constructor(
    readonly typeName: string,
    readonly supported: string[],
  ) {
    super(
      `Setup param type "${typeName}" is not supported yet. Supported types: ${supported.join(', ')}`,
    )
  }
}
