#!/usr/bin/env tsx
import { resolve } from "node:path";
import { getConfig } from "./config";
import { Pacer } from "./pacer";
import { enrichCsv } from "./pipeline/enrich";
import { createImageFetcher } from "./providers/index";

const args = process.argv.slice(2);

function printUsage(): void {
  console.log(`
anime-images <input.csv> [output.csv]

Adds an "image" column with a cover URL for each row, looked up by id.
Re-running reuses images already present in the output.

Arguments:
  input.csv    Input CSV (required)
  output.csv   Output CSV (default: <input>_with_images.csv)

Environment:
  IMAGE_SOURCE        jikan or html (default: jikan)
  JIKAN_BASE_URL      Jikan API base (default: https://api.jikan.moe/v4)
  MAL_BASE_URL        Page base for the html source (default: https://myanimelist.net)
  IMAGE_ID_COLUMN     Id column name (default: MAL_ID)
  REQUEST_TIMEOUT_MS  Per-request timeout (default: 10000)
  LOOKUP_RETRIES      Retries for 429/5xx and network errors (default: 2)
  PAUSE_MIN_MS        Minimum pause between lookups (default: 1000)
  PAUSE_MAX_MS        Maximum pause between lookups (default: 1600)
  SAVE_EVERY          Rows between flushes to disk (default: 50)
`);
}

async function main(): Promise<void> {
  const [inputArg, outputArg] = args;
  if (!inputArg || inputArg === "help" || inputArg === "--help") {
    printUsage();
    process.exit(1);
  }

  const config = getConfig();
  const fetcher = createImageFetcher(config.imageSource, {
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
    retry: { retries: config.retries },
  });
  const pacer = new Pacer({ minMs: config.pauseMinMs, maxMs: config.pauseMaxMs });

  const result = await enrichCsv({
    inputPath: resolve(inputArg),
    outputPath: outputArg ? resolve(outputArg) : undefined,
    idColumn: config.idColumn,
    saveEvery: config.saveEvery,
    fetcher,
    pacer,
  });

  console.log(
    `Rows: ${result.rows} (reused ${result.reused}, fetched ${result.fetched}, without image ${result.missing})`
  );
  console.log(`All done. Output saved to: ${result.outputPath}`);
}

main().catch((err) => {
  console.error("Error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
