#!/usr/bin/env node
import config from "./config";
import { runApp } from "./app";
import { ReadlinePrompter } from "./cli/prompter";
import { openDatabase, type DatabaseHandle } from "./db";
import { createServices } from "./services";

const openOrExit = async (): Promise<DatabaseHandle> => {
  try {
    const handle = await openDatabase(config.databasePath);
    console.log(`[db] using ${config.databasePath}`);
    return handle;
  } catch (err) {
    console.error("Failed to open the database:", err);
    process.exit(1);
  }
};

async function start() {
  const handle = await openOrExit();

  const services = createServices(handle.db, config);
  const io = new ReadlinePrompter();

  let stopping = false;
  const shutdown = (code: number) => {
    if (stopping) return;
    stopping = true;
    io.close();
    try {
      handle.close();
    } catch (err) {
      console.error("Failed to save the database:", err);
      code = 1;
    }
    process.exit(code);
  };
  const interrupt = () => {
    io.print("\n\nApplication terminated by user.");
    shutdown(0);
  };
  // readline takes Ctrl+C while it owns the terminal; the process signal covers `kill -INT`.
  io.onInterrupt(interrupt);
  process.on("SIGINT", interrupt);

  try {
    if (await services.auth.ensureDefaultAdmin()) {
      handle.save();
      io.print(
        `Default admin created: username=${config.defaultAdmin.username}, password=${config.defaultAdmin.password}`
      );
    }
    await runApp({ io, services, config, persist: handle.save });
    shutdown(0);
  } catch (err) {
    console.error("Fatal error:", err);
    shutdown(1);
  }
}

void start();
