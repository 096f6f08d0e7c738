import { PassThrough } from "node:stream";
import { describe, expect, it, vi } from "vitest";
import { ValidationError } from "../utils/errors";
import { FakePrompter } from "../test/helpers";
import { askOptionalInteger, confirm, parseDecimal, ReadlinePrompter } from "./prompter";

const terminal = () => {
  const input = new PassThrough();
  const output = Object.assign(new PassThrough(), { isTTY: true });
  return { input, prompter: new ReadlinePrompter(input, output) };
};

describe("ReadlinePrompter", () => {
  it("hands Ctrl+C to the interrupt handler", async () => {
    const { input, prompter } = terminal();
    const interrupted = new Promise<void>((resolve) => prompter.onInterrupt(resolve));

    input.write("\x03");
    await interrupted;
    prompter.close();
  });

  it("treats the end of input as an interrupt", async () => {
    const input = new PassThrough();
    const prompter = new ReadlinePrompter(input, new PassThrough());
    const interrupted = new Promise<void>((resolve) => prompter.onInterrupt(resolve));

    input.end();
    await interrupted;
  });

  it("does not report its own close as an interrupt", () => {
    const prompter = new ReadlinePrompter(new PassThrough(), new PassThrough());
    const handler = vi.fn();
    prompter.onInterrupt(handler);

    prompter.close();
    expect(handler).not.toHaveBeenCalled();
  });

  it("trims answers", async () => {
    const input = new PassThrough();
    const prompter = new ReadlinePrompter(input, new PassThrough());
    const answer = prompter.ask("Name: ");
    input.write("  Marta \n");

    await expect(answer).resolves.toBe("Marta");
    prompter.close();
  });
});

describe("typed prompts", () => {
  it("keeps the current value on a blank answer", async () => {
    const io = new FakePrompter([""]);
    await expect(askOptionalInteger(io, "Capacity", 30)).resolves.toBeUndefined();
    expect(io.questions).toEqual(["Capacity [30]: "]);
  });

  it("accepts y and yes only", async () => {
    await expect(confirm(new FakePrompter(["YES"]), "Drop?")).resolves.toBe(true);
    await expect(confirm(new FakePrompter(["n"]), "Drop?")).resolves.toBe(false);
  });

  it("rejects a blank decimal", () => {
    expect(() => parseDecimal("Salary", " ")).toThrow(ValidationError);
  });
});
