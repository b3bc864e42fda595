import type { FieldKind } from '../types';

export type ErrorCode =
  | 'UNKNOWN_FIELD'
  | 'TYPE_MISMATCH'
  | 'WIZARD_CANCELLED'
  | 'SNAPSHOT_FORMAT'
  | 'PERSISTENCE_FAILED';

export class AgentBuilderError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Field referenced that the active tier does not define. Programmer error. */
export class UnknownFieldError extends AgentBuilderError {
  constructor(readonly field: string, readonly tier: string) {
    super('UNKNOWN_FIELD', `Field "${field}" is not part of the ${tier} tier`);
  }
}

export class TypeMismatchError extends AgentBuilderError {
  constructor(readonly field: string, readonly expected: FieldKind, detail: string) {
    super('TYPE_MISMATCH', `Field "${field}" holds ${expected}: ${detail}`);
  }
}

export class WizardCancelledError extends AgentBuilderError {
  constructor() {
    super('WIZARD_CANCELLED', 'Prompt building was cancelled');
  }
}

export class SnapshotFormatError extends AgentBuilderError {
  constructor(readonly filePath: string, detail: string, cause?: unknown) {
    super('SNAPSHOT_FORMAT', `Invalid snapshot ${filePath}: ${detail}`, { cause });
  }
}

export class PersistenceError extends AgentBuilderError {
  constructor(readonly filePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('PERSISTENCE_FAILED', `Could not write ${filePath}: ${reason}`, { cause });
  }
}
