// src/config.ts
import dotenv from "dotenv";
dotenv.config();

export interface AppConfig {
  databasePath: string;
  exportDir: string;
  saltRounds: number;
  defaultAdmin: {
    username: string;
    password: string;
    email: string;
  };
  roomHoursPerWeek: number;
  defaultClassHours: number;
}

const positiveNumber = (raw: string | undefined, fallback: number): number => {
  if (!raw) return fallback;
  const value = Number(raw);
  return Number.isFinite(value) && value > 0 ? value : fallback;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => ({
  databasePath: env.DATABASE_PATH || "campus-records.db",
  exportDir: env.EXPORT_DIR || "exports",
  saltRounds: Math.round(positiveNumber(env.BCRYPT_SALT_ROUNDS, 10)),
  defaultAdmin: {
    username: env.DEFAULT_ADMIN_USERNAME || "admin",
    password: env.DEFAULT_ADMIN_PASSWORD || "admin123",
    email: env.DEFAULT_ADMIN_EMAIL || "admin@campus.local",
  },
  roomHoursPerWeek: positiveNumber(env.ROOM_HOURS_PER_WEEK, 40),
  defaultClassHours: positiveNumber(env.DEFAULT_CLASS_HOURS, 3),
});

const config = loadConfig();

export default config;
