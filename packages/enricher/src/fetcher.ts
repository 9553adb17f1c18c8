import type { RetryPolicy } from "./retry";

export type ImageSourceName = "jikan" | "html";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ImageFetcher {
  readonly source: ImageSourceName;
  /** Resolves to null when the record has no image or the lookup failed. */
  fetchImageUrl(externalId: string): Promise<string | null>;
}

export interface FetcherConfig {
  baseUrl: string;
  timeoutMs: number;
  retry: Partial<RetryPolicy>;
  fetchImpl: FetchLike;
}
