// src/script/seed.ts
import fs from "fs";
import path from "path";
import config from "../config";
import { openDatabase } from "../db";
import { createServices } from "../services";
import { parseDemoData, seedDemoData } from "./demoData";

const DEMO_DATA_PATH = path.resolve(__dirname, "../../data/demo-data.json");

async function main() {
  const handle = await openDatabase(config.databasePath);
  const services = createServices(handle.db, config);

  try {
    await services.auth.ensureDefaultAdmin();
    await services.auth.login(config.defaultAdmin.username, config.defaultAdmin.password);

    if (services.courses.listCourses().length > 0) {
      console.log("Database already has records. Seeding skipped.");
      return;
    }

    console.log(`Loading demo data from ${DEMO_DATA_PATH}...`);
    const data = parseDemoData(JSON.parse(fs.readFileSync(DEMO_DATA_PATH, "utf8")));
    const summary = await seedDemoData(services, data);

    console.log("\nDemo data created:");
    console.log(
      `  ${summary.courses} courses, ${summary.faculty} faculty, ${summary.students} students, ${summary.classes} classes, ${summary.enrollments} enrollments`
    );
    console.log(`  Faculty and students log in with the password "${data.password}".`);
  } finally {
    services.auth.logout();
    handle.close();
  }
}

main().catch((e) => {
  console.error("An error occurred during seeding:", e);
  process.exitCode = 1;
});
