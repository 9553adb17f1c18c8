import type { FetcherConfig, ImageFetcher, ImageSourceName } from "../fetcher";
import { HttpStatusError, withRetry } from "../retry";

export const JIKAN_BASE_URL = "https://api.jikan.moe/v4";

function field(value: unknown, key: string): unknown {
  return typeof value === "object" && value !== null ? Reflect.get(value, key) : undefined;
}

/** Reads `data.images.jpg.image_url` from a Jikan anime response. */
export function extractJikanImageUrl(payload: unknown): string | null {
  const url = field(field(field(field(payload, "data"), "images"), "jpg"), "image_url");
  return typeof url === "string" && url.trim() ? url.trim() : null;
}

export class JikanImageFetcher implements ImageFetcher {
  readonly source: ImageSourceName = "jikan";
  private readonly config: FetcherConfig;

  constructor(config: Partial<FetcherConfig> = {}) {
    this.config = {
      baseUrl: config.baseUrl ?? JIKAN_BASE_URL,
      timeoutMs: config.timeoutMs ?? 10000,
      retry: config.retry ?? {},
      fetchImpl: config.fetchImpl ?? fetch,
    };
  }

  async fetchImageUrl(externalId: string): Promise<string | null> {
    const url = `${this.config.baseUrl}/anime/${encodeURIComponent(externalId)}`;

    try {
      const payload = await withRetry(async () => {
        const res = await this.config.fetchImpl(url, {
          headers: { Accept: "application/json" },
          signal: AbortSignal.timeout(this.config.timeoutMs),
        });

        if (res.status !== 200) {
          throw new HttpStatusError(res.status, url);
        }

        const body: unknown = await res.json();
        return body;
      }, this.config.retry);

      return extractJikanImageUrl(payload);
    } catch (error) {
      console.error(`Image lookup failed for ${externalId}:`, error instanceof Error ? error.message : error);
      return null;
    }
  }
}
