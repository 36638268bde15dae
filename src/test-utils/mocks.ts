/**
 * Test utilities - Mock factories for dependency injection interfaces
 */

import type { CreateTagOptions, FileSystem, Prompter, Repository, ShellExecutor } from "#/core";
import type { BumpKind } from "#/versioning";

/**
 * Create a mock FileSystem with in-memory storage
 */
export function createMockFileSystem(
  initialFiles: Record<string, string> = {}
): FileSystem & { files: Map<string, string> } {
  const files = new Map<string, string>(Object.entries(initialFiles));

  return {
    files,

    readFile(path: string): string {
      const content = files.get(path);
      if (content === undefined) {
        throw new Error(`ENOENT: no such file or directory, open '${path}'`);
      }
      return content;
    },

    exists(path: string): boolean {
      return files.has(path);
    },
  };
}

/**
 * Recorded shell execution call
 */
interface ShellCall {
  command: string;
  args: string[];
}

/**
 * Create a mock ShellExecutor with predefined command outputs.
 * Keys match the full command line ("git tag --list --merged HEAD") first,
 * then the command name alone ("git").
 */
export function createMockShellExecutor(
  results: Record<string, string | Error> = {}
): ShellExecutor & { calls: ShellCall[]; commands: string[] } {
  const calls: ShellCall[] = [];
  const commands: string[] = [];

  return {
    calls,
    commands,

    execFile(command: string, args: string[]): string {
      const line = [command, ...args].join(" ");
      calls.push({ command, args });
      commands.push(line);

      const result = results[line] ?? results[command];
      if (result instanceof Error) {
        throw result;
      }

      // Default: return empty string (command succeeded)
      return result ?? "";
    },
  };
}

/**
 * Create an in-memory repository with a fixed branch and tag list.
 * `otherTags` exist but are not reachable from HEAD.
 * Created tags are appended to `created` and to the tag list.
 */
export function createMockRepository(
  state: { branch?: string; tags?: string[]; otherTags?: string[] } = {}
): Repository & { tags: string[]; created: Array<{ name: string } & CreateTagOptions> } {
  const tags = [...(state.tags ?? [])];
  const created: Array<{ name: string } & CreateTagOptions> = [];

  return {
    tags,
    created,

    verify(): void {},

    currentBranch(): string {
      return state.branch ?? "main";
    },

    listTags(): string[] {
      return [...tags];
    },

    tagExists(name: string): boolean {
      return tags.includes(name) || (state.otherTags ?? []).includes(name);
    },

    createTag(name: string, options: CreateTagOptions): void {
      created.push({ name, ...options });
      tags.push(name);
    },
  };
}

/**
 * Create a Prompter answering from scripted queues.
 * Throws when a queue runs dry so unexpected prompts fail the test.
 */
export function createMockPrompter(
  answers: { bumpKinds?: BumpKind[]; confirms?: boolean[] } = {}
): Prompter & { questions: string[] } {
  const bumpKinds = [...(answers.bumpKinds ?? [])];
  const confirms = [...(answers.confirms ?? [])];
  const questions: string[] = [];

  return {
    questions,

    async selectBumpKind(): Promise<BumpKind> {
      questions.push("select bump kind");
      const kind = bumpKinds.shift();
      if (kind === undefined) {
        throw new Error("Unexpected bump kind prompt");
      }
      return kind;
    },

    async confirm(message: string): Promise<boolean> {
      questions.push(message);
      const answer = confirms.shift();
      if (answer === undefined) {
        throw new Error(`Unexpected confirmation: ${message}`);
      }
      return answer;
    },
  };
}

/**
 * Create a line reader answering from a scripted list.
 */
export function createScriptedAsk(
  answers: string[]
): ((question: string) => Promise<string>) & { questions: string[] } {
  const queue = [...answers];
  const questions: string[] = [];

  const ask = async (question: string): Promise<string> => {
    questions.push(question);
    const answer = queue.shift();
    if (answer === undefined) {
      throw new Error(`Unexpected question: ${question}`);
    }
    return answer;
  };

  return Object.assign(ask, { questions });
}
