import { FetchError, toFailureReason } from "../../domain/errors.js";
import { fetchWithTimeout } from "./fetchWithTimeout.js";

export interface FetchedPage {
  /** URL after redirects. */
  url: string;
  status: number;
  contentType: string;
  body: string;
}

export interface PageFetcher {
  fetchPage(url: string): Promise<FetchedPage>;
}

export interface HttpPageFetcherOptions {
  timeoutMs: number;
  userAgent: string;
}

const HTML_CONTENT_TYPES = ["text/html", "application/xhtml+xml"];

export class HttpPageFetcher implements PageFetcher {
  constructor(private readonly options: HttpPageFetcherOptions) {}

  async fetchPage(url: string): Promise<FetchedPage> {
    let page: FetchedPage;
    try {
      page = await fetchWithTimeout(
        url,
        {
          redirect: "follow",
          headers: {
            "User-Agent": this.options.userAgent,
            Accept: "text/html,application/xhtml+xml;q=0.9,*/*;q=0.5",
            "Accept-Language": "en-US,en;q=0.5",
          },
        },
        this.options.timeoutMs,
        async (response) => {
          const contentType = response.headers.get("content-type") ?? "";
          let body = "";
          if (response.ok && isHtml(contentType)) {
            body = await response.text();
          } else {
            // Unread bodies keep the connection checked out.
            await response.body?.cancel();
          }
          return { url: response.url || url, status: response.status, contentType, body };
        },
      );
    } catch (error) {
      throw new FetchError(url, `Fetch failed for ${url}: ${toFailureReason(error)}`, undefined, {
        cause: error,
      });
    }

    if (page.status < 200 || page.status >= 300) {
      throw new FetchError(url, `HTTP ${page.status} for ${url}`, page.status);
    }

    if (!isHtml(page.contentType)) {
      throw new FetchError(
        url,
        `Unsupported content type ${mediaTypeOf(page.contentType)} for ${url}`,
        page.status,
      );
    }

    return page;
  }
}

function mediaTypeOf(contentType: string): string {
  return contentType.split(";")[0].trim().toLowerCase();
}

// A missing content type is treated as HTML.
function isHtml(contentType: string): boolean {
  const mediaType = mediaTypeOf(contentType);
  return !mediaType || HTML_CONTENT_TYPES.includes(mediaType);
}
