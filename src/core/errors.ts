export type EngineErrorCode = 'validation' | 'precondition' | 'gateway' | 'collaborator' | 'unsupported';

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed or empty input, oversize messages, missing command parameters. */
export class ValidationError extends EngineError {
  constructor(message: string) {
    super('validation', message);
  }
}

/** A command needs a node selection that is absent. */
export class PreconditionError extends EngineError {
  constructor(message: string) {
    super('precondition', message);
  }
}

/** Transport or response-shape failure of the assistant gateway. */
export class GatewayError extends EngineError {
  constructor(message: string, cause?: unknown) {
    super('gateway', message, { cause });
  }
}

/** Tree store, generation or research failure. */
export class CollaboratorError extends EngineError {
  constructor(message: string, cause?: unknown) {
    super('collaborator', message, { cause });
  }
}

/** A recognized request the editor cannot fulfil yet. */
export class UnsupportedError extends EngineError {
  constructor(message: string) {
    super('unsupported', message);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
