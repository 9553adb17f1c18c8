import * as cheerio from "cheerio";
import type { FetcherConfig, ImageFetcher, ImageSourceName } from "../fetcher";
import { HttpStatusError, withRetry } from "../retry";

export const MAL_BASE_URL = "https://myanimelist.net";

const PAGE_HEADERS = {
  "User-Agent": "Mozilla/5.0 (compatible; AnimeImageFetcher/1.0)",
  Referer: "https://myanimelist.net/",
  Accept: "text/html,application/xhtml+xml",
};

const FALLBACK_SELECTORS = ["#content img", ".leftside img", ".pic img"];

function present(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Best guess at a cover image on an anime page: the Open Graph image, then the
 * schema.org image, then the first image in the main layout blocks.
 */
export function extractImageUrlFromHtml(html: string): string | null {
  const $ = cheerio.load(html);

  const og = present($('meta[property="og:image"]').attr("content"));
  if (og) return og;

  const itemprop = $('img[itemprop="image"]').first();
  const fromItemprop = present(itemprop.attr("data-src")) ?? present(itemprop.attr("src"));
  if (fromItemprop) return fromItemprop;

  for (const selector of FALLBACK_SELECTORS) {
    const src = present($(selector).first().attr("src"));
    if (src) return src;
  }

  return null;
}

export class HtmlImageFetcher implements ImageFetcher {
  readonly source: ImageSourceName = "html";
  private readonly config: FetcherConfig;

  constructor(config: Partial<FetcherConfig> = {}) {
    this.config = {
      baseUrl: config.baseUrl ?? MAL_BASE_URL,
      timeoutMs: config.timeoutMs ?? 10000,
      retry: config.retry ?? {},
      fetchImpl: config.fetchImpl ?? fetch,
    };
  }

  async fetchImageUrl(externalId: string): Promise<string | null> {
    const url = `${this.config.baseUrl}/anime/${encodeURIComponent(externalId)}`;

    try {
      const html = await withRetry(async () => {
        const res = await this.config.fetchImpl(url, {
          headers: PAGE_HEADERS,
          signal: AbortSignal.timeout(this.config.timeoutMs),
        });

        if (res.status !== 200) {
          throw new HttpStatusError(res.status, url);
        }
        return res.text();
      }, this.config.retry);

      return extractImageUrlFromHtml(html);
    } catch (error) {
      console.error(`Image page failed for ${externalId}:`, error instanceof Error ? error.message : error);
      return null;
    }
  }
}
