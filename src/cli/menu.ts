// src/cli/menu.ts
import { errorHandler } from "../middlewares/errorHandler";
import type { Action, CliContext } from "./context";

/** Wraps an action the way middleware wraps a handler. */
export type ActionWrapper = (action: Action) => Action;

interface MenuEntry {
  label: string;
  action: Action;
}

/**
 * A numbered console menu. Wrappers registered with `use` apply to every
 * option added after them, outermost first.
 *
 * ```ts
 * const menu = new MenuRouter("Faculty Management");
 * menu.use(protect);
 * menu.use(restrictTo("admin"));
 * menu.option("Add faculty", facultyController.addFaculty);
 * ```
 */
export class MenuRouter {
  private readonly wrappers: ActionWrapper[] = [];
  private readonly entries: MenuEntry[] = [];

  constructor(
    readonly title: string,
    private readonly exitLabel = "Back"
  ) {}

  use(wrapper: ActionWrapper): this {
    this.wrappers.push(wrapper);
    return this;
  }

  option(label: string, action: Action): this {
    const wrapped = this.wrappers.reduceRight((inner, wrap) => wrap(inner), action);
    this.entries.push({ label, action: wrapped });
    return this;
  }

  /** Adds a sub-menu as one option of this menu. */
  mount(label: string, menu: MenuRouter): this {
    return this.option(label, (ctx) => menu.run(ctx));
  }

  get labels(): string[] {
    return this.entries.map((entry) => entry.label);
  }

  /**
   * Shows the menu until the user picks 0 or the session ends. A failing
   * action is reported and the menu is shown again. Changes are persisted
   * after every action, failed or not.
   */
  async run(ctx: CliContext): Promise<void> {
    const { io } = ctx;
    const last = this.entries.length;

    for (;;) {
      io.print();
      io.print(this.title);
      io.print("-".repeat(Math.max(this.title.length, 40)));
      this.entries.forEach((entry, index) => io.print(`${index + 1}. ${entry.label}`));
      io.print(`0. ${this.exitLabel}`);

      const choice = await io.ask(`\nEnter your choice (0-${last}): `);
      if (choice === "0") return;

      const index = Number(choice);
      const entry: MenuEntry | undefined =
        Number.isInteger(index) && index >= 1 ? this.entries[index - 1] : undefined;
      if (!entry) {
        io.print(`Please enter a number between 0 and ${last}.`);
        continue;
      }

      try {
        await entry.action(ctx);
      } catch (err) {
        errorHandler(err, io);
      }
      try {
        ctx.persist();
      } catch (err) {
        errorHandler(err, io);
      }
      if (!ctx.services.auth.isLoggedIn()) return;
    }
  }
}
