/**
 * Interactive prompts
 *
 * The answer parsing lives in createPrompter, which only needs a line reader.
 * createReadlineAsk provides that reader on top of node:readline.
 */

import * as readline from "node:readline";
import { stdin, stdout } from "node:process";
import type { Prompter } from "#/core";
import { ErrorCodes, TaggrError } from "#/errors";
import { bumpKindLabel, parseBumpKind, type BumpKind } from "#/versioning";

export const MAX_PROMPT_ATTEMPTS = 3;

export type Ask = (question: string) => Promise<string>;

/**
 * Resolve an answer to the bump selection: a 1-based index or a kind name.
 *
 * @example parseBumpAnswer("2", ["major", "minor", "patch"]) → "minor"
 * @example parseBumpAnswer("Patch", ["major", "minor", "patch"]) → "patch"
 */
export function parseBumpAnswer(answer: string, choices: readonly BumpKind[]): BumpKind | null {
  const trimmed = answer.trim();

  if (/^\d+$/.test(trimmed)) {
    return choices[Number(trimmed) - 1] ?? null;
  }

  const kind = parseBumpKind(trimmed);
  return kind !== null && choices.includes(kind) ? kind : null;
}

/**
 * Resolve a yes/no answer. Empty input takes the default.
 */
export function parseConfirmAnswer(answer: string, defaultValue: boolean): boolean | null {
  const normalized = answer.trim().toLowerCase();

  if (normalized === "") return defaultValue;
  if (normalized === "y" || normalized === "yes") return true;
  if (normalized === "n" || normalized === "no") return false;
  return null;
}

async function askUntilValid<T>(
  ask: Ask,
  question: string,
  parse: (answer: string) => T | null,
  hint: string
): Promise<T> {
  let prompt = question;

  for (let attempt = 1; attempt <= MAX_PROMPT_ATTEMPTS; attempt++) {
    const value = parse(await ask(prompt));
    if (value !== null) return value;
    prompt = `${hint} ${question}`;
  }

  throw new TaggrError(ErrorCodes.INVALID_INPUT, `No valid answer after ${MAX_PROMPT_ATTEMPTS} attempts`);
}

export function createPrompter(ask: Ask): Prompter {
  return {
    async selectBumpKind(choices) {
      const options = choices.map((kind, index) => `${index + 1}) ${bumpKindLabel(kind)}`).join("  ");
      const question = `Which version to bump? ${options}\n> `;
      return askUntilValid(
        ask,
        question,
        (answer) => parseBumpAnswer(answer, choices),
        `Please enter 1-${choices.length} or a name.`
      );
    },

    async confirm(message, defaultValue) {
      const question = `${message} ${defaultValue ? "(Y/n)" : "(y/N)"} `;
      return askUntilValid(
        ask,
        question,
        (answer) => parseConfirmAnswer(answer, defaultValue),
        "Please answer y or n."
      );
    },
  };
}

export interface LineReader extends Ask {
  /** Release the input stream. Pending and later questions reject with PROMPT_CANCELLED. */
  close(): void;
}

function cancelled(): TaggrError {
  return new TaggrError(ErrorCodes.PROMPT_CANCELLED);
}

/**
 * Line reader on stdin/stdout, shared by every question of a run.
 * Lines that arrive before a question is asked (piped input) are queued.
 * Ctrl+C or the end of input rejects with PROMPT_CANCELLED once the queue is empty.
 * The interface is opened on the first question.
 */
export function createReadlineAsk(
  streams: { input?: NodeJS.ReadableStream; output?: NodeJS.WritableStream } = {}
): LineReader {
  const output = streams.output ?? stdout;
  const lines: string[] = [];
  const waiting: Array<{ resolve: (line: string) => void; reject: (error: TaggrError) => void }> = [];
  let rl: readline.Interface | null = null;
  let closed = false;

  const close = (): void => {
    if (closed) return;
    closed = true;
    rl?.close();
    for (const pending of waiting.splice(0)) {
      pending.reject(cancelled());
    }
  };

  const open = (): void => {
    if (rl !== null) return;
    rl = readline.createInterface({ input: streams.input ?? stdin, output });
    rl.on("line", (line) => {
      const pending = waiting.shift();
      if (pending) {
        pending.resolve(line);
      } else {
        lines.push(line);
      }
    });
    rl.on("SIGINT", close);
    rl.on("close", close);
  };

  const ask = (question: string): Promise<string> => {
    output.write(question);

    const queued = lines.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (closed) return Promise.reject(cancelled());

    open();
    return new Promise((resolve, reject) => {
      waiting.push({ resolve, reject });
    });
  };

  return Object.assign(ask, { close });
}
