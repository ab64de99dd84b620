import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { ArtifactError } from "../src/domain/errors.js";
import { chunkSchema } from "../src/domain/schemas.js";
import { ChunkRecord } from "../src/domain/types.js";
import { readJsonl, writeJsonl } from "../src/infra/artifacts/jsonl.js";
import { resolveArtifactPaths } from "../src/infra/artifacts/paths.js";

const TEST_DIR = path.resolve(".tmp-tests-jsonl");

const CHUNK: ChunkRecord = {
  id: "pg_0123456789abcdef:0",
  sourceUrl: "https://example.com/products/kitkat",
  title: "KitKat",
  index: 0,
  text: "Crispy wafer fingers covered in milk chocolate.",
  startOffset: 0,
  endOffset: 47,
  category: "product",
};

describe("JSON Lines artifacts", () => {
  afterEach(async () => {
    await fs.rm(TEST_DIR, { recursive: true, force: true });
  });

  it("writes and reads plain and gzip files", async () => {
    for (const name of ["chunks.jsonl", "chunks.jsonl.gz"]) {
      const filePath = path.join(TEST_DIR, name);
      await expect(writeJsonl(filePath, [CHUNK])).resolves.toBe(1);
      const { records, invalid } = await readJsonl(filePath, chunkSchema);
      expect(records).toEqual([CHUNK]);
      expect(invalid).toEqual([]);
    }

    const gzipped = await fs.readFile(path.join(TEST_DIR, "chunks.jsonl.gz"));
    expect([gzipped[0], gzipped[1]]).toEqual([0x1f, 0x8b]);
  });

  it("reports malformed lines and keeps the valid ones", async () => {
    const filePath = path.join(TEST_DIR, "mixed.jsonl");
    await fs.mkdir(TEST_DIR, { recursive: true });
    await fs.writeFile(
      filePath,
      [JSON.stringify(CHUNK), "", "{not json", JSON.stringify({ id: "x" }), JSON.stringify({ ...CHUNK, extra: true })].join(
        "\n",
      ),
      "utf-8",
    );

    const { records, invalid } = await readJsonl(filePath, chunkSchema);
    expect(records).toEqual([CHUNK, CHUNK]);
    expect(invalid).toEqual([
      { line: 3, reason: "invalid JSON" },
      {
        line: 4,
        reason: "sourceUrl: Required; index: Required; text: Required; startOffset: Required; endOffset: Required",
      },
    ]);
  });

  it("fills defaults for optional fields", async () => {
    const filePath = path.join(TEST_DIR, "defaults.jsonl");
    await fs.mkdir(TEST_DIR, { recursive: true });
    const { title: _title, category: _category, ...minimal } = CHUNK;
    await fs.writeFile(filePath, `${JSON.stringify(minimal)}\n`, "utf-8");

    const { records } = await readJsonl(filePath, chunkSchema);
    expect(records).toEqual([{ ...CHUNK, title: "", category: "unknown" }]);
  });

  it("rejects a missing file with ArtifactError", async () => {
    await expect(readJsonl(path.join(TEST_DIR, "missing.jsonl"), chunkSchema)).rejects.toBeInstanceOf(
      ArtifactError,
    );
  });

  it("names artifacts under the data directory", () => {
    const paths = resolveArtifactPaths("data", true);
    expect(paths.chunks).toBe(path.join("data", "chunks.jsonl.gz"));
    expect(paths.embedFailures).toBe(path.join("data", "embed-failures.jsonl"));
    expect(resolveArtifactPaths("data", false).pages).toBe(path.join("data", "pages.jsonl"));
  });
});
