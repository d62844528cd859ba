import type { Person } from '../types';
import {
  InvalidStudentIdError,
  InvalidStudentNameError,
  ScoreOutOfRangeError,
} from './errors';
import { formatStudent } from './format';
import { isValidScore, isValidStudentId } from './validation';

/**
 * A student: an identity plus an ordered list of scores in [0, 100].
 *
 * The score at position `i` is the student's result for subject index `i`.
 * The list only grows, and callers only ever see copies of it.
 */
export class Student implements Person {
  readonly identity: Person;
  private readonly scoreList: number[] = [];

  constructor(name: string, id: number, scores: Iterable<number> = []) {
    const trimmedName = name.trim();
    if (trimmedName.length === 0) {
      throw new InvalidStudentNameError();
    }
    if (!isValidStudentId(id)) {
      throw new InvalidStudentIdError(id);
    }

    this.identity = Object.freeze({ name: trimmedName, id });

    for (const score of scores) {
      this.addScore(score);
    }
  }

  get name(): string {
    return this.identity.name;
  }

  get id(): number {
    return this.identity.id;
  }

  addScore(value: number): void {
    if (!isValidScore(value)) {
      throw new ScoreOutOfRangeError(value);
    }
    this.scoreList.push(value);
  }

  scores(): number[] {
    return [...this.scoreList];
  }

  /** Mean of all scores, or 0 when there are none. */
  averageScore(): number {
    if (this.scoreList.length === 0) {
      return 0;
    }
    const sum = this.scoreList.reduce((a, b) => a + b, 0);
    return sum / this.scoreList.length;
  }

  toString(): string {
    return formatStudent(this);
  }
}
