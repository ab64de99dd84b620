import { SplitStrategyName } from "../config/env.js";
import { ConfigError, SplitError } from "../domain/errors.js";
import { Category, ChunkRecord, ClassifiedPage, FailedItem } from "../domain/types.js";
import { Logger } from "../utils/logger.js";
import { createChunkId } from "../utils/text.js";

export interface TextSpan {
  start: number;
  end: number;
}

export interface ChunkingOptions {
  maxChunkSize: number;
  overlapSize: number;
}

export interface DelimiterChunkingOptions extends ChunkingOptions {
  /** How far back from the hard cut to look for a paragraph, sentence or line break. */
  lookback: number;
}

/**
 * Splits text into spans of at most `maxChunkSize` characters. Consecutive
 * spans overlap by at most `overlapSize` characters and the last span always
 * ends at `text.length`. Generators are restartable: each call starts over.
 */
export interface ChunkingStrategy {
  readonly name: SplitStrategyName;
  spans(text: string): Generator<TextSpan, void, undefined>;
}

const SENTENCE_ENDINGS = new Set([".", "!", "?", "。", "！", "？"]);
// CJK full stops are not followed by a space.
const SPACELESS_SENTENCE_ENDINGS = new Set(["。", "！", "？"]);

abstract class WindowedStrategy implements ChunkingStrategy {
  abstract readonly name: SplitStrategyName;

  protected constructor(protected readonly options: ChunkingOptions) {
    if (!Number.isInteger(options.maxChunkSize) || options.maxChunkSize <= 0) {
      throw new ConfigError("maxChunkSize must be a positive integer.");
    }
    if (
      !Number.isInteger(options.overlapSize) ||
      options.overlapSize < 0 ||
      options.overlapSize >= options.maxChunkSize
    ) {
      throw new ConfigError("overlapSize must be an integer in [0, maxChunkSize).");
    }
  }

  *spans(text: string): Generator<TextSpan, void, undefined> {
    if (!text.trim()) {
      return;
    }

    let start = 0;
    while (start < text.length) {
      const hardEnd = start + this.options.maxChunkSize;
      let end = hardEnd >= text.length ? text.length : this.chooseEnd(text, start, hardEnd);
      if (splitsSurrogatePair(text, end) && end - 1 > start + this.options.overlapSize) {
        end -= 1;
      }
      yield { start, end };

      if (end >= text.length) {
        return;
      }
      start = end - this.options.overlapSize;
      if (start < end && splitsSurrogatePair(text, start)) {
        start += 1;
      }
    }
  }

  /** End of a non-final window; must lie in (start + overlapSize, hardEnd]. */
  protected abstract chooseEnd(text: string, start: number, hardEnd: number): number;
}

export class FixedWidthStrategy extends WindowedStrategy {
  readonly name = "fixed" as const;

  constructor(options: ChunkingOptions) {
    super(options);
  }

  protected chooseEnd(_text: string, _start: number, hardEnd: number): number {
    return hardEnd;
  }
}

export class DelimiterAwareStrategy extends WindowedStrategy {
  readonly name = "delimiter" as const;

  private readonly lookback: number;

  constructor(options: DelimiterChunkingOptions) {
    super(options);
    if (!Number.isInteger(options.lookback) || options.lookback < 0) {
      throw new ConfigError("lookback must be a non-negative integer.");
    }
    this.lookback = options.lookback;
  }

  protected chooseEnd(text: string, start: number, hardEnd: number): number {
    const lowest = Math.max(start + this.options.overlapSize + 1, hardEnd - this.lookback);

    let sentenceEnd = -1;
    let lineEnd = -1;
    for (let end = hardEnd; end >= lowest; end -= 1) {
      if (isParagraphBreak(text, end)) {
        return end;
      }
      if (sentenceEnd < 0 && isSentenceBreak(text, end)) {
        sentenceEnd = end;
      }
      if (lineEnd < 0 && text[end - 1] === "\n") {
        lineEnd = end;
      }
    }

    if (sentenceEnd > 0) {
      return sentenceEnd;
    }
    return lineEnd > 0 ? lineEnd : hardEnd;
  }
}

/** `end` sits right after a blank line. */
function isParagraphBreak(text: string, end: number): boolean {
  return end >= 2 && text[end - 1] === "\n" && text[end - 2] === "\n";
}

// Offset falls between the two UTF-16 halves of one code point.
function splitsSurrogatePair(text: string, offset: number): boolean {
  if (offset <= 0 || offset >= text.length) {
    return false;
  }
  const high = text.charCodeAt(offset - 1);
  const low = text.charCodeAt(offset);
  return high >= 0xd800 && high <= 0xdbff && low >= 0xdc00 && low <= 0xdfff;
}

/** `end` sits right after sentence punctuation that is followed by whitespace. */
function isSentenceBreak(text: string, end: number): boolean {
  const previous = text[end - 1];
  if (!SENTENCE_ENDINGS.has(previous)) {
    return false;
  }
  if (SPACELESS_SENTENCE_ENDINGS.has(previous)) {
    return true;
  }
  return end < text.length && /\s/.test(text[end]);
}

export function createChunkingStrategy(
  strategy: SplitStrategyName,
  options: DelimiterChunkingOptions,
): ChunkingStrategy {
  if (strategy === "fixed") {
    return new FixedWidthStrategy(options);
  }
  return new DelimiterAwareStrategy(options);
}

/**
 * Inverse of chunking: joins chunk texts in order, dropping the part of each
 * chunk that overlaps its predecessor.
 */
export function reconstructText(chunks: Array<Pick<ChunkRecord, "text" | "startOffset" | "endOffset">>): string {
  let result = "";
  let covered = 0;
  for (const chunk of chunks) {
    result += chunk.text.slice(Math.max(0, covered - chunk.startOffset));
    covered = chunk.endOffset;
  }
  return result;
}

export interface SplitterOptions {
  excludeCategories: Category[];
}

export interface SplitResult {
  chunks: ChunkRecord[];
  failures: FailedItem[];
  skippedPages: number;
}

export class Splitter {
  constructor(
    private readonly strategy: ChunkingStrategy,
    private readonly options: SplitterOptions,
    private readonly logger: Logger,
  ) {}

  *splitPage(page: ClassifiedPage): Generator<ChunkRecord, void, undefined> {
    let index = 0;
    for (const span of this.strategy.spans(page.text)) {
      yield {
        id: createChunkId(page.url, span.start),
        sourceUrl: page.url,
        title: page.title,
        index,
        text: page.text.slice(span.start, span.end),
        startOffset: span.start,
        endOffset: span.end,
        category: page.category,
      };
      index += 1;
    }
  }

  split(pages: ClassifiedPage[]): SplitResult {
    const chunks: ChunkRecord[] = [];
    const failures: FailedItem[] = [];
    let skippedPages = 0;

    for (const page of pages) {
      if (this.options.excludeCategories.includes(page.category)) {
        skippedPages += 1;
        continue;
      }

      const pageChunks = [...this.splitPage(page)];
      if (pageChunks.length === 0) {
        const error = new SplitError(page.url, `No text to split for ${page.url}`);
        this.logger.warn(error.message);
        failures.push({ id: page.url, reason: error.message });
        continue;
      }
      chunks.push(...pageChunks);
    }

    this.logger.info(
      `Split ${pages.length - skippedPages} pages into ${chunks.length} chunks using ${this.strategy.name} strategy (${skippedPages} pages skipped by category, ${failures.length} empty)`,
    );
    return { chunks, failures, skippedPages };
  }
}
