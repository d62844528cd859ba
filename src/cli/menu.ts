/**
 * Console Menu
 *
 * Numbered menu over a StudentManager. Validation errors from the manager are
 * printed and the loop carries on; bad numeric input is reported and the user
 * is returned to the menu. End of input exits like option 5.
 */

import { isStudentRecordError } from '../lib/errors';
import { formatStudent } from '../lib/format';
import { createLogger } from '../lib/logger';
import type { StudentManager } from '../lib/manager';
import { Student } from '../lib/student';
import { parseIntegerInput, sanitizeString } from '../lib/validation';
import type { OutputSink, Prompter } from './prompt';

const log = createLogger('menu');

export const MENU_TEXT = [
  '',
  '--- Menu ---',
  '1. Display All Students',
  '2. Search Student by ID',
  '3. Get Top Student in Subject',
  '4. Add New Student',
  '5. Exit',
  '6. Find Students by Name',
  '',
].join('\n');

type MenuOutcome = 'continue' | 'exit';

type IntegerAnswer =
  | { status: 'ok'; value: number }
  | { status: 'invalid' }
  | { status: 'eof' };

interface MenuContext {
  manager: StudentManager;
  prompter: Prompter;
  println(line?: string): void;
}

async function askInteger(
  ctx: MenuContext,
  question: string,
  paramName: string,
  min?: number
): Promise<IntegerAnswer> {
  const answer = await ctx.prompter.ask(question);
  if (answer === undefined) {
    return { status: 'eof' };
  }

  const parsed = parseIntegerInput(answer, paramName, min);
  if (!parsed.valid) {
    ctx.println(parsed.error);
    return { status: 'invalid' };
  }
  return { status: 'ok', value: parsed.value };
}

function displayAllStudents(ctx: MenuContext): MenuOutcome {
  const listing = ctx.manager.listAll();
  if (listing.kind === 'empty') {
    ctx.println('No students found.');
    return 'continue';
  }

  ctx.println('All Students:');
  for (const student of listing.students) {
    ctx.println(formatStudent(student));
  }
  return 'continue';
}

async function searchById(ctx: MenuContext): Promise<MenuOutcome> {
  const id = await askInteger(ctx, 'Enter Student ID to search: ', 'student ID');
  if (id.status !== 'ok') return id.status === 'eof' ? 'exit' : 'continue';

  const student = ctx.manager.findById(id.value);
  if (student) {
    ctx.println(`Student found:\n${formatStudent(student)}`);
  } else {
    ctx.println('Student not found.');
  }
  return 'continue';
}

async function topStudentInSubject(ctx: MenuContext): Promise<MenuOutcome> {
  const index = await askInteger(
    ctx,
    'Enter subject index (0 for first subject, 1 for second, etc.): ',
    'subject index'
  );
  if (index.status !== 'ok') return index.status === 'eof' ? 'exit' : 'continue';

  const student = ctx.manager.topScorerForSubject(index.value);
  if (student) {
    ctx.println(`Top student in subject ${index.value + 1}:\n${formatStudent(student)}`);
  } else {
    ctx.println('No top student found for that subject.');
  }
  return 'continue';
}

async function addNewStudent(ctx: MenuContext): Promise<MenuOutcome> {
  const name = await ctx.prompter.ask('Enter student name: ');
  if (name === undefined) return 'exit';

  const id = await askInteger(ctx, 'Enter student ID: ', 'student ID');
  if (id.status !== 'ok') return id.status === 'eof' ? 'exit' : 'continue';

  const student = new Student(name, id.value);

  const count = await askInteger(ctx, 'How many scores to add? ', 'score count', 0);
  if (count.status !== 'ok') return count.status === 'eof' ? 'exit' : 'continue';

  for (let i = 0; i < count.value; i++) {
    const score = await askInteger(ctx, `Enter score ${i + 1}: `, 'score');
    if (score.status !== 'ok') return score.status === 'eof' ? 'exit' : 'continue';
    student.addScore(score.value);
  }

  ctx.manager.addStudent(student);
  log.info('Student added from console', { id: student.id, name: sanitizeString(student.name) });
  ctx.println('Student added successfully.');
  return 'continue';
}

async function findByName(ctx: MenuContext): Promise<MenuOutcome> {
  const query = await ctx.prompter.ask('Enter name to search: ');
  if (query === undefined) return 'exit';

  const matches = ctx.manager.searchByName(query);
  if (matches.length === 0) {
    ctx.println('No matching students found.');
    return 'continue';
  }

  ctx.println('Matching Students:');
  for (const student of matches) {
    ctx.println(formatStudent(student));
  }
  return 'continue';
}

async function runChoice(ctx: MenuContext, choice: number): Promise<MenuOutcome> {
  switch (choice) {
    case 1:
      return displayAllStudents(ctx);
    case 2:
      return searchById(ctx);
    case 3:
      return topStudentInSubject(ctx);
    case 4:
      return addNewStudent(ctx);
    case 5:
      return 'exit';
    case 6:
      return findByName(ctx);
    default:
      ctx.println('Invalid choice. Try again.');
      return 'continue';
  }
}

/**
 * Runs the menu until the user exits or input ends
 */
export async function runMenu(
  manager: StudentManager,
  prompter: Prompter,
  output: OutputSink
): Promise<void> {
  const ctx: MenuContext = {
    manager,
    prompter,
    println: (line = '') => {
      output.write(`${line}\n`);
    },
  };

  let outcome: MenuOutcome = 'continue';
  while (outcome === 'continue') {
    output.write(MENU_TEXT);

    const choice = await askInteger(ctx, 'Enter your choice: ', 'choice');
    if (choice.status === 'eof') break;
    if (choice.status === 'invalid') continue;

    try {
      outcome = await runChoice(ctx, choice.value);
    } catch (err) {
      if (!isStudentRecordError(err)) throw err;
      log.debug('Menu action rejected', { choice: choice.value, code: err.code });
      ctx.println(err.message);
    }
  }

  ctx.println('Exiting...');
}
