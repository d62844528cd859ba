import type { OutputSink, Prompter } from '../cli/prompt';
import { StudentManager } from '../lib/manager';
import { Student } from '../lib/student';

/** Answers prompts from a fixed list, then reports end of input. */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  closed = false;
  private readonly answers: string[];

  constructor(answers: string[]) {
    this.answers = [...answers];
  }

  async ask(question: string): Promise<string | undefined> {
    this.questions.push(question);
    return this.answers.shift();
  }

  close(): void {
    this.closed = true;
  }
}

export class BufferOutput implements OutputSink {
  text = '';

  write(text: string): void {
    this.text += text;
  }
}

/** The three demo students from data/students.json. */
export function demoManager(): StudentManager {
  const manager = new StudentManager();
  manager.addStudent(new Student('Bhavna Shah', 101, [80, 90, 85]));
  manager.addStudent(new Student('Harsh Jain', 102, [95, 88, 92]));
  manager.addStudent(new Student('Meera Das', 103, [78, 85, 80]));
  return manager;
}
