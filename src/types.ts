export interface Person {
  readonly name: string;
  readonly id: number;
}

/** A student record as it appears in a seed file. */
export interface StudentSeed {
  name: string;
  id: number;
  scores: number[];
}

export type Environment = 'development' | 'production' | 'test';

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

export interface NameSearchSettings {
  threshold: number;
  limit: number;
}

export interface AppConfig {
  logLevel: LogLevelName;
  seedFile: string;
  nameSearch: NameSearchSettings;
}
