// Curated public API
export type { Person, StudentSeed, AppConfig, Environment, LogLevelName, NameSearchSettings } from './types';
export { Student } from './lib/student';
export { StudentManager } from './lib/manager';
export type { StudentListing, StudentManagerOptions } from './lib/manager';
export {
  StudentRecordError,
  ScoreOutOfRangeError,
  DuplicateIdError,
  InvalidSubjectIndexError,
  InvalidStudentIdError,
  InvalidStudentNameError,
  SeedDataError,
  isStudentRecordError,
} from './lib/errors';
export type { StudentRecordErrorCode } from './lib/errors';
export { formatStudent, formatPerson, formatScores, formatAverage } from './lib/format';
export { loadSeedFile, parseSeedData, seedManager } from './lib/seed';
export { loadConfig } from './lib/config';
export { createLogger, setLogLevel } from './lib/logger';
export type { Logger } from './lib/logger';
export { runMenu, MENU_TEXT } from './cli/menu';
export { LinePrompter } from './cli/prompt';
export type { Prompter, OutputSink } from './cli/prompt';
