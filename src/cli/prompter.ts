// src/cli/prompter.ts
import readline from "node:readline/promises";
import { ValidationError } from "../utils/errors";

/** Everything the console front-end needs from a terminal. */
export interface Prompter {
  ask(question: string): Promise<string>;
  print(line?: string): void;
  /** Called on Ctrl+C, or when input ends before `close`. */
  onInterrupt(handler: () => void): void;
  close(): void;
}

export class ReadlinePrompter implements Prompter {
  private readonly rl: readline.Interface;
  private closing = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = readline.createInterface({ input, output });
  }

  async ask(question: string): Promise<string> {
    const answer = await this.rl.question(question);
    return answer.trim();
  }

  print(line = ""): void {
    this.output.write(`${line}\n`);
  }

  onInterrupt(handler: () => void): void {
    this.rl.on("SIGINT", handler);
    this.rl.on("close", () => {
      if (!this.closing) handler();
    });
  }

  close(): void {
    this.closing = true;
    this.rl.close();
  }
}

// --- Typed prompts ---

export const askRequired = async (io: Prompter, label: string): Promise<string> => {
  const answer = await io.ask(`${label}: `);
  if (!answer) throw new ValidationError(`${label} is required.`);
  return answer;
};

/** Empty input means "keep the current value". */
export const askOptional = async (
  io: Prompter,
  label: string,
  current?: string | number
): Promise<string | undefined> => {
  const hint = current === undefined ? "" : ` [${current}]`;
  const answer = await io.ask(`${label}${hint}: `);
  return answer === "" ? undefined : answer;
};

export const parseInteger = (label: string, raw: string): number => {
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ValidationError(`${label} must be a whole number.`);
  }
  return value;
};

export const parseDecimal = (label: string, raw: string): number => {
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new ValidationError(`${label} must be a number.`);
  }
  return value;
};

export const askInteger = async (io: Prompter, label: string): Promise<number> =>
  parseInteger(label, await askRequired(io, label));

export const askDecimal = async (io: Prompter, label: string): Promise<number> =>
  parseDecimal(label, await askRequired(io, label));

export const askOptionalInteger = async (
  io: Prompter,
  label: string,
  current?: number
): Promise<number | undefined> => {
  const answer = await askOptional(io, label, current);
  return answer === undefined ? undefined : parseInteger(label, answer);
};

export const confirm = async (io: Prompter, question: string): Promise<boolean> => {
  const answer = await io.ask(`${question} (y/n): `);
  return answer.toLowerCase() === "y" || answer.toLowerCase() === "yes";
};
