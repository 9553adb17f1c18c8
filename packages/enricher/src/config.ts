import type { ImageSourceName } from "./fetcher";
import { DEFAULT_ID_COLUMN, DEFAULT_SAVE_EVERY } from "./pipeline/enrich";
import { MAL_BASE_URL } from "./providers/html";
import { JIKAN_BASE_URL } from "./providers/jikan";

export interface EnricherConfig {
  imageSource: ImageSourceName;
  baseUrl: string;
  idColumn: string;
  timeoutMs: number;
  retries: number;
  pauseMinMs: number;
  pauseMaxMs: number;
  saveEvery: number;
}

const DEFAULT_CONFIG = {
  timeoutMs: 10000,
  retries: 2,
  pauseMinMs: 1000,
  pauseMaxMs: 1600,
};

function readInt(value: string | undefined, fallback: number, min: number): number {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isInteger(parsed) && parsed >= min ? parsed : fallback;
}

function readSource(value: string | undefined): ImageSourceName {
  return value === "html" ? "html" : "jikan";
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): EnricherConfig {
  const imageSource = readSource(env.IMAGE_SOURCE);
  const baseUrl =
    imageSource === "html" ? (env.MAL_BASE_URL || MAL_BASE_URL) : (env.JIKAN_BASE_URL || JIKAN_BASE_URL);

  return {
    imageSource,
    baseUrl: baseUrl.replace(/\/+$/, ""),
    idColumn: env.IMAGE_ID_COLUMN || DEFAULT_ID_COLUMN,
    timeoutMs: readInt(env.REQUEST_TIMEOUT_MS, DEFAULT_CONFIG.timeoutMs, 1),
    retries: readInt(env.LOOKUP_RETRIES, DEFAULT_CONFIG.retries, 0),
    pauseMinMs: readInt(env.PAUSE_MIN_MS, DEFAULT_CONFIG.pauseMinMs, 0),
    pauseMaxMs: readInt(env.PAUSE_MAX_MS, DEFAULT_CONFIG.pauseMaxMs, 0),
    saveEvery: readInt(env.SAVE_EVERY, DEFAULT_SAVE_EVERY, 1),
  };
}
