export type ErrorKind = 'not_found' | 'unauthorized' | 'invalid_input' | 'validation_failed' | 'execution_failed';

export class CapabilityRuntimeError extends Error {
  readonly kind: ErrorKind = 'execution_failed';

  constructor(message: string, cause?: unknown) {
    super(message, cause ? { cause } : undefined);
    this.name = 'CapabilityRuntimeError';
  }
}

export class CapabilityNotFoundError extends CapabilityRuntimeError {
  override readonly kind = 'not_found';

  constructor(identifier: string, detail?: string) {
    super(detail ?? `Unable to load capability "${identifier}" as an id or function name.`);
    this.name = 'CapabilityNotFoundError';
  }
}

export class UnauthorizedError extends CapabilityRuntimeError {
  override readonly kind = 'unauthorized';

  constructor(message = 'You do not have permission to access this function.') {
    super(message);
    this.name = 'UnauthorizedError';
  }
}

export class InvalidInputError extends CapabilityRuntimeError {
  override readonly kind = 'invalid_input';

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'InvalidInputError';
  }
}

export interface Violation {
  context: string;
  label: string;
  message: string;
}

export class ValidationFailedError extends CapabilityRuntimeError {
  override readonly kind = 'validation_failed';

  constructor(readonly violations: readonly Violation[]) {
    super(violations.map((v) => `Invalid value for ${v.label}: ${v.message}`).join('\n'));
    this.name = 'ValidationFailedError';
  }
}

export class ExecutionFailedError extends CapabilityRuntimeError {
  override readonly kind = 'execution_failed';

  constructor(capabilityId: string, cause: unknown) {
    super(`Capability ${capabilityId} failed: ${describeError(cause)}`, cause);
    this.name = 'ExecutionFailedError';
  }
}

export type InvocationError =
  | CapabilityNotFoundError
  | UnauthorizedError
  | InvalidInputError
  | ValidationFailedError
  | ExecutionFailedError;

export function isInvocationError(e: unknown): e is InvocationError {
  return (
    e instanceof CapabilityNotFoundError ||
    e instanceof UnauthorizedError ||
    e instanceof InvalidInputError ||
    e instanceof ValidationFailedError ||
    e instanceof ExecutionFailedError
  );
}

export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message || e.name;
  return String(e);
}
