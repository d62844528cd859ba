import type { Person } from '../types';

export interface ScoredPerson extends Person {
  scores(): number[];
  averageScore(): number;
}

export function formatPerson(person: Person): string {
  return `Name: ${person.name}, ID: ${person.id}`;
}

export function formatScores(scores: readonly number[]): string {
  return `[${scores.join(', ')}]`;
}

/**
 * Whole averages keep one decimal place (85 -> "85.0"), others print in full
 */
export function formatAverage(average: number): string {
  return Number.isInteger(average) ? average.toFixed(1) : String(average);
}

export function formatStudent(student: ScoredPerson): string {
  return `${formatPerson(student)}\nScores: ${formatScores(student.scores())}, Average: ${formatAverage(student.averageScore())}`;
}
