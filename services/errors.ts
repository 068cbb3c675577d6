import type { DifficultyTier, Language } from '../types';

export type TutorErrorCode =
  | 'LOAD_ERROR'
  | 'INSUFFICIENT_DATA'
  | 'INVALID_STATE'
  | 'VALIDATION'
  | 'NOT_FOUND';

export class TutorError extends Error {
  readonly code: TutorErrorCode;

  constructor(code: TutorErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Corpus or rule data could not be loaded. Fatal at startup.
 */
export class LoadError extends TutorError {
  readonly entryIndex?: number;

  constructor(message: string, entryIndex?: number) {
    super('LOAD_ERROR', entryIndex === undefined ? message : `Entry #${entryIndex}: ${message}`);
    this.entryIndex = entryIndex;
  }
}

export class InsufficientDataError extends TutorError {
  constructor(
    readonly language: Language,
    readonly tier: DifficultyTier,
    readonly requested: number,
    readonly available: number
  ) {
    super('INSUFFICIENT_DATA', `Need ${requested} ${tier} ${language} entries, only ${available} available`);
  }
}

export class InvalidStateError extends TutorError {
  constructor(message: string) {
    super('INVALID_STATE', message);
  }
}

export class ValidationError extends TutorError {
  constructor(message: string) {
    super('VALIDATION', message);
  }
}

export class NotFoundError extends TutorError {
  constructor(message: string) {
    super('NOT_FOUND', message);
  }
}
