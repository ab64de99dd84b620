import { ClassificationAmbiguousError } from "../domain/errors.js";
import { CATEGORIES, Category, ClassifiedPage, PageRecord } from "../domain/types.js";
import { Logger } from "../utils/logger.js";
import { countWords, pathSegments } from "../utils/text.js";

export interface ClassifierOptions {
  /** Unmatched pages with at least this much text become "other" instead of "unknown". */
  minOtherChars: number;
}

export interface ClassificationInput {
  url: string;
  title: string;
  text: string;
  links: string[];
}

export interface ClassificationDecision {
  category: Category;
  reason: "url" | "content" | "fallback" | "ambiguous";
  candidates: Category[];
}

interface UrlRule {
  category: Category;
  segments: string[];
}

interface ContentRule {
  category: Category;
  matches: (input: ClassificationInput) => boolean;
}

// Ordered: the first rule with a matching path segment wins.
const URL_RULES: UrlRule[] = [
  { category: "product", segments: ["product", "products"] },
  { category: "recipe", segments: ["recipe", "recipes"] },
  { category: "article", segments: ["article", "articles", "blog", "news", "stories"] },
  { category: "navigation", segments: ["sitemap", "search", "category", "categories", "tags"] },
];

const CONTENT_RULES: ContentRule[] = [
  {
    category: "recipe",
    matches: ({ text }) =>
      /\bingredients?\b/i.test(text) &&
      /\b(directions|instructions|method|preparation)\b/i.test(text),
  },
  {
    category: "product",
    matches: ({ text }) =>
      /\b(nutrition facts|add to cart|where to buy|net (wt|weight)|sku)\b/i.test(text),
  },
  {
    category: "navigation",
    matches: ({ text, links }) => links.length >= 10 && countWords(text) < links.length * 5,
  },
];

/**
 * Assigns exactly one category. Pure: the same (url, text, links) always gives
 * the same decision.
 */
export function classifyPage(
  input: ClassificationInput,
  options: ClassifierOptions,
): ClassificationDecision {
  const segments = pathSegments(input.url);
  if (segments.length === 0) {
    return { category: "navigation", reason: "url", candidates: ["navigation"] };
  }

  for (const rule of URL_RULES) {
    if (segments.some((segment) => rule.segments.includes(segment))) {
      return { category: rule.category, reason: "url", candidates: [rule.category] };
    }
  }

  const candidates = CONTENT_RULES.filter((rule) => rule.matches(input)).map(
    (rule) => rule.category,
  );
  if (candidates.length === 1) {
    return { category: candidates[0], reason: "content", candidates };
  }
  if (candidates.length > 1) {
    return { category: "unknown", reason: "ambiguous", candidates };
  }

  const category = input.text.trim().length >= options.minOtherChars ? "other" : "unknown";
  return { category, reason: "fallback", candidates: [] };
}

export interface ClassificationResult {
  pages: ClassifiedPage[];
  counts: Record<Category, number>;
  ambiguous: ClassificationAmbiguousError[];
}

export class Classifier {
  constructor(
    private readonly options: ClassifierOptions,
    private readonly logger: Logger,
  ) {}

  classify(pages: PageRecord[]): ClassificationResult {
    const counts = emptyCounts();
    const ambiguous: ClassificationAmbiguousError[] = [];

    const classified = pages.map((page): ClassifiedPage => {
      const decision = classifyPage(page, this.options);
      if (decision.reason === "ambiguous") {
        const error = new ClassificationAmbiguousError(page.url, decision.candidates);
        ambiguous.push(error);
        this.logger.warn(`${error.message}; labelled unknown`);
      }
      counts[decision.category] += 1;
      return { ...page, category: decision.category };
    });

    this.logger.info(
      `Classified ${classified.length} pages: ${CATEGORIES.map((category) => `${category}=${counts[category]}`).join(", ")}`,
    );
    return { pages: classified, counts, ambiguous };
  }
}

function emptyCounts(): Record<Category, number> {
  return { product: 0, recipe: 0, article: 0, navigation: 0, other: 0, unknown: 0 };
}
