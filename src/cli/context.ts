// src/cli/context.ts
import type { Services } from "../services";
import type { AppConfig } from "../config";
import type { Prompter } from "./prompter";

export interface CliContext {
  io: Prompter;
  services: Services;
  config: AppConfig;
  /** Writes committed changes to disk. The menu calls it after every action. */
  persist: () => void;
}

/** A single menu action. Controllers export these; routes wire them to menu entries. */
export type Action = (ctx: CliContext) => Promise<void>;
