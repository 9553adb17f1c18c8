import type { FetcherConfig, ImageFetcher, ImageSourceName } from "../fetcher";
import { HtmlImageFetcher } from "./html";
import { JikanImageFetcher } from "./jikan";

export { HtmlImageFetcher, MAL_BASE_URL, extractImageUrlFromHtml } from "./html";
export { JikanImageFetcher, JIKAN_BASE_URL, extractJikanImageUrl } from "./jikan";

export function createImageFetcher(
  source: ImageSourceName,
  config: Partial<FetcherConfig> = {}
): ImageFetcher {
  switch (source) {
    case "jikan":
      return new JikanImageFetcher(config);
    case "html":
      return new HtmlImageFetcher(config);
    default:
      throw new Error(`Unsupported image source: ${String(source)}`);
  }
}
