export type ErrorMetadata = Record<string, unknown>;

/** Base for errors raised by the resolver's own contracts. */
export class ResolverError extends Error {
  readonly metadata: ErrorMetadata | undefined;

  constructor(message: string, metadata?: ErrorMetadata) {
    super(message);
    this.name = this.constructor.name;
    this.metadata = metadata;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A context whose reference lies outside its min/max window. */
export class InvalidContextError extends ResolverError {}

/** A constraint built from out-of-range calendar fields. */
export class InvalidConstraintError extends ResolverError {}
