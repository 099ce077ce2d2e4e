/**
 * Error taxonomy shared by the normalizer, compiler and interpreter
 */
export const ErrorKind = {
  InvalidJSON: 'InvalidJSON',
  MissingRequiredField: 'MissingRequiredField',
  InvalidIdentifier: 'InvalidIdentifier',
  UnsupportedOperator: 'UnsupportedOperator',
  InvalidValue: 'InvalidValue',
  UnknownOperation: 'UnknownOperation',
  RemoteFailure: 'RemoteFailure',
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

/**
 * A locally detected problem with the user's input.
 * Raised before any statement reaches the server.
 */
export class CliError extends Error {
  readonly kind: ErrorKind;
  readonly field?: string;

  constructor(kind: ErrorKind, message: string, field?: string) {
    super(message);
    this.name = 'CliError';
    this.kind = kind;
    this.field = field;
  }
}

/**
 * Failure reported by the server (or by the transport on the way to it)
 */
export class RemoteError extends Error {
  readonly code?: string | number;

  constructor(message: string, code?: string | number) {
    super(message);
    this.name = 'RemoteError';
    this.code = code;
  }
}

export function missingField(field: string): CliError {
  return new CliError(
    ErrorKind.MissingRequiredField,
    `Missing required field: ${field}`,
    field
  );
}
