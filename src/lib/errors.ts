/**
 * Student Record Errors
 *
 * Validation failures raised by the record model and the manager. Each carries
 * a stable code so callers can branch without matching on message text.
 * Lookups that find nothing return `undefined` and never throw.
 */

export type StudentRecordErrorCode =
  | 'SCORE_OUT_OF_RANGE'
  | 'DUPLICATE_ID'
  | 'INVALID_SUBJECT_INDEX'
  | 'INVALID_STUDENT_ID'
  | 'INVALID_STUDENT_NAME'
  | 'SEED_DATA_INVALID';

export class StudentRecordError extends Error {
  readonly code: StudentRecordErrorCode;

  constructor(code: StudentRecordErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StudentRecordError';
    this.code = code;
  }
}

export class ScoreOutOfRangeError extends StudentRecordError {
  readonly score: number;

  constructor(score: number) {
    super(
      'SCORE_OUT_OF_RANGE',
      Number.isInteger(score)
        ? 'Score must be between 0 and 100'
        : 'Score must be a whole number between 0 and 100'
    );
    this.name = 'ScoreOutOfRangeError';
    this.score = score;
  }
}

export class DuplicateIdError extends StudentRecordError {
  readonly id: number;

  constructor(id: number) {
    super('DUPLICATE_ID', `Student with ID ${id} already exists`);
    this.name = 'DuplicateIdError';
    this.id = id;
  }
}

export class InvalidSubjectIndexError extends StudentRecordError {
  readonly subjectIndex: number;

  constructor(subjectIndex: number) {
    super(
      'INVALID_SUBJECT_INDEX',
      Number.isInteger(subjectIndex)
        ? 'Subject index cannot be negative'
        : 'Subject index must be a whole number'
    );
    this.name = 'InvalidSubjectIndexError';
    this.subjectIndex = subjectIndex;
  }
}

export class InvalidStudentIdError extends StudentRecordError {
  readonly id: number;

  constructor(id: number) {
    super('INVALID_STUDENT_ID', 'Student ID must be a whole number');
    this.name = 'InvalidStudentIdError';
    this.id = id;
  }
}

export class InvalidStudentNameError extends StudentRecordError {
  constructor() {
    super('INVALID_STUDENT_NAME', 'Student name cannot be empty');
    this.name = 'InvalidStudentNameError';
  }
}

export class SeedDataError extends StudentRecordError {
  readonly source: string;

  constructor(source: string, message: string, options?: ErrorOptions) {
    super('SEED_DATA_INVALID', `Invalid seed data in ${source}: ${message}`, options);
    this.name = 'SeedDataError';
    this.source = source;
  }
}

export function isStudentRecordError(value: unknown): value is StudentRecordError {
  return value instanceof StudentRecordError;
}
