/**
 * Student Manager
 *
 * Owns every Student by ID. Membership is insert-only: there is no removal or
 * replacement, and the manager is the only place IDs are checked for
 * uniqueness. Scores are appended on the Student objects themselves.
 */

import type { NameSearchSettings } from '../types';
import { DEFAULT_NAME_SEARCH } from './config';
import { DuplicateIdError, InvalidSubjectIndexError } from './errors';
import { createLogger } from './logger';
import { binarySearch, hybridSearch } from './search';
import type { Student } from './student';
import { isValidSubjectIndex, sanitizeString } from './validation';

const log = createLogger('StudentManager');

export type StudentListing =
  | { kind: 'empty' }
  | { kind: 'students'; students: Student[] };

export interface StudentManagerOptions {
  nameSearch?: Partial<NameSearchSettings>;
}

export class StudentManager {
  private readonly students = new Map<number, Student>();
  private readonly nameSearch: NameSearchSettings;
  // Rebuilt lazily after each insert; also the key of the fuzzy index cache
  private nameSnapshot: Student[] | null = null;

  constructor(options: StudentManagerOptions = {}) {
    this.nameSearch = { ...DEFAULT_NAME_SEARCH, ...options.nameSearch };
  }

  get size(): number {
    return this.students.size;
  }

  /**
   * Inserts a student, failing with DuplicateIdError if the ID is taken
   */
  addStudent(student: Student): void {
    if (this.students.has(student.id)) {
      log.debug('Rejected duplicate student ID', { id: student.id });
      throw new DuplicateIdError(student.id);
    }

    this.students.set(student.id, student);
    this.nameSnapshot = null;
    log.debug('Student added', { id: student.id, total: this.students.size });
  }

  /**
   * Sorts a snapshot of all students by ID and binary-searches it.
   * The snapshot is rebuilt on every call.
   */
  findById(id: number): Student | undefined {
    const sorted = [...this.students.values()].sort((a, b) => a.id - b.id);
    return binarySearch(sorted, id, (s) => s.id);
  }

  listAll(): StudentListing {
    if (this.students.size === 0) {
      return { kind: 'empty' };
    }
    return { kind: 'students', students: [...this.students.values()] };
  }

  /**
   * Student with the highest score at `subjectIndex`. Students without a
   * score at that position are skipped. Which student wins a tie is not
   * defined.
   */
  topScorerForSubject(subjectIndex: number): Student | undefined {
    if (!isValidSubjectIndex(subjectIndex)) {
      throw new InvalidSubjectIndexError(subjectIndex);
    }

    let topStudent: Student | undefined;
    let topScore = -1;

    for (const student of this.students.values()) {
      const score = student.scores()[subjectIndex];
      if (score !== undefined && score > topScore) {
        topScore = score;
        topStudent = student;
      }
    }

    return topStudent;
  }

  /**
   * Name search: exact and prefix matches first, then fuzzy matches
   */
  searchByName(query: string, limit: number = this.nameSearch.limit): Student[] {
    if (!this.nameSnapshot) {
      this.nameSnapshot = [...this.students.values()];
    }

    const results = hybridSearch(
      this.nameSnapshot,
      query,
      {
        keys: ['name'],
        threshold: this.nameSearch.threshold,
        minMatchCharLength: 1,
      },
      (s) => s.name
    );

    log.debug('Name search', { query: sanitizeString(query), matches: results.length });

    return limit > 0 ? results.slice(0, limit) : results;
  }
}
