/**
 * Seed Data
 *
 * Loads the roster the console starts with. A seed file is a JSON array of
 * `{ name, id, scores }` objects.
 */

import fs from 'fs/promises';
import type { StudentSeed } from '../types';
import { SeedDataError, isStudentRecordError } from './errors';
import { createLogger } from './logger';
import type { StudentManager } from './manager';
import { Student } from './student';

const log = createLogger('seed');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Checks the shape of parsed seed JSON. Field values (score range, ID
 * uniqueness) are checked when the students are created.
 */
export function parseSeedData(raw: unknown, source: string): StudentSeed[] {
  if (!Array.isArray(raw)) {
    throw new SeedDataError(source, 'expected an array of students');
  }

  return raw.map((entry: unknown, index): StudentSeed => {
    if (!isRecord(entry)) {
      throw new SeedDataError(source, `entry ${index} is not an object`);
    }

    const { name, id, scores } = entry;
    if (typeof name !== 'string') {
      throw new SeedDataError(source, `entry ${index} has no name`);
    }
    if (typeof id !== 'number') {
      throw new SeedDataError(source, `entry ${index} has no numeric id`);
    }

    if (scores === undefined) {
      return { name, id, scores: [] };
    }
    if (!Array.isArray(scores) || !scores.every((s): s is number => typeof s === 'number')) {
      throw new SeedDataError(source, `entry ${index} scores must be an array of numbers`);
    }

    return { name, id, scores };
  });
}

export async function loadSeedFile(filePath: string): Promise<StudentSeed[]> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (err) {
    throw new SeedDataError(filePath, 'file could not be read', { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new SeedDataError(filePath, 'file is not valid JSON', { cause: err });
  }

  return parseSeedData(raw, filePath);
}

/**
 * Adds every seed to the manager and returns how many were added. Stops at
 * the first invalid entry; entries before it stay added.
 */
export function seedManager(
  manager: StudentManager,
  seeds: readonly StudentSeed[],
  source = 'seed list'
): number {
  let added = 0;

  for (const [index, seed] of seeds.entries()) {
    try {
      manager.addStudent(new Student(seed.name, seed.id, seed.scores));
    } catch (err) {
      if (isStudentRecordError(err)) {
        throw new SeedDataError(source, `entry ${index}: ${err.message}`, { cause: err });
      }
      throw err;
    }
    added++;
  }

  log.info('Seeded students', { source, count: added });
  return added;
}
