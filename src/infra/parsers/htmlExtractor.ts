import * as cheerio from "cheerio";
import { PageImage } from "../../domain/types.js";
import { collapseWhitespace, normalizeUrl } from "../../utils/text.js";

export interface ExtractedPage {
  title: string;
  text: string;
  links: string[];
  images: PageImage[];
}

const TEXT_BLOCK_SELECTOR = "h1, h2, h3, h4, p, li, td, th";
const REMOVED_SELECTOR = "script, style, noscript, template, svg, iframe";
const VALID_IMAGE_EXTENSIONS = [".jpg", ".jpeg", ".png", ".svg", ".gif", ".webp"];

/**
 * Pulls title, readable text blocks, outgoing links and images out of an HTML
 * document. Links and image URLs are resolved against `pageUrl`.
 */
export function extractPage(html: string, pageUrl: string): ExtractedPage {
  const $ = cheerio.load(html);
  $(REMOVED_SELECTOR).remove();

  const title =
    collapseWhitespace($("title").first().text()) || collapseWhitespace($("h1").first().text());

  const blocks: string[] = [];
  $(TEXT_BLOCK_SELECTOR).each((_, element) => {
    const node = $(element);
    // Nested blocks (p inside li, ...) are emitted by the innermost element only.
    if (node.find(TEXT_BLOCK_SELECTOR).length > 0) {
      return;
    }
    const text = collapseWhitespace(node.text());
    if (text && blocks[blocks.length - 1] !== text) {
      blocks.push(text);
    }
  });

  const links = new Set<string>();
  $("a[href]").each((_, element) => {
    const href = $(element).attr("href");
    if (!href || href.startsWith("#") || /^(mailto|tel|javascript):/i.test(href)) {
      return;
    }
    const normalized = normalizeUrl(href, pageUrl);
    if (normalized) {
      links.add(normalized);
    }
  });

  const images: PageImage[] = [];
  const seenImages = new Set<string>();
  $("img[src]").each((_, element) => {
    const src = $(element).attr("src");
    if (!src) {
      return;
    }
    let resolved: URL;
    try {
      resolved = new URL(src, pageUrl);
    } catch {
      return;
    }
    const extension = resolved.pathname.slice(resolved.pathname.lastIndexOf(".")).toLowerCase();
    if (!VALID_IMAGE_EXTENSIONS.includes(extension) || seenImages.has(resolved.href)) {
      return;
    }
    seenImages.add(resolved.href);
    images.push({ url: resolved.href, alt: collapseWhitespace($(element).attr("alt") ?? "") });
  });

  return {
    title,
    text: blocks.join("\n"),
    links: [...links],
    images,
  };
}
