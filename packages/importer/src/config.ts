import { dirname, join } from "node:path";
import { DEFAULT_COMMIT_EVERY } from "./pipeline/import";

export interface ImporterConfig {
  commitEvery: number;
}

function readPositiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): ImporterConfig {
  return {
    commitEvery: readPositiveInt(env.IMPORT_COMMIT_EVERY, DEFAULT_COMMIT_EVERY),
  };
}

export function defaultDatabasePath(csvPath: string): string {
  return join(dirname(csvPath), "anime.db");
}
