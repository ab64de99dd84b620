import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { UploadError } from "../../domain/errors.js";
import { GraphStoreStats, UpsertResult, VectorSearchInput } from "../../domain/graphStore.js";
import { categorySchema } from "../../domain/schemas.js";
import { EmbeddedChunkRecord, SearchHit } from "../../domain/types.js";
import { InMemoryGraphSnapshot, InMemoryGraphStore } from "./inMemoryGraphStore.js";

const CURRENT_FORMAT_VERSION = 1;

const snapshotSchema = z.object({
  pages: z.array(
    z.object({
      url: z.string(),
      title: z.string(),
      category: categorySchema,
    }),
  ),
  chunks: z.array(
    z.object({
      id: z.string(),
      sourceUrl: z.string(),
      title: z.string(),
      index: z.number().int(),
      text: z.string(),
      startOffset: z.number().int(),
      endOffset: z.number().int(),
      category: categorySchema,
      embedding: z.array(z.number()),
      embeddingModelId: z.string(),
    }),
  ),
  categories: z.array(categorySchema),
});

const persistedSchema = z.object({
  format_version: z.number().int(),
  saved_at: z.string(),
  snapshot: z.unknown(),
});

interface PersistedGraph {
  format_version: number;
  saved_at: string;
  snapshot: InMemoryGraphSnapshot;
}

export interface PersistentGraphStoreOptions {
  maxBytes: number;
}

export interface GraphStorageInfo {
  path: string;
  exists: boolean;
  format_version: number;
  max_bytes: number;
  size_bytes: number;
}

/** In-memory graph written to a JSON file after every upsert. */
export class PersistentInMemoryGraphStore extends InMemoryGraphStore {
  private initialized = false;

  private writeChain: Promise<void> = Promise.resolve();

  private readonly absolutePath: string;

  constructor(
    filePath: string,
    private readonly options: PersistentGraphStoreOptions,
  ) {
    super();
    this.absolutePath = path.resolve(filePath);
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await fs.mkdir(path.dirname(this.absolutePath), { recursive: true });

    try {
      const raw = await fs.readFile(this.absolutePath, "utf-8");
      this.importSnapshot(parseSnapshotFromDisk(JSON.parse(raw)));
    } catch (error) {
      if (!hasErrorCode(error, "ENOENT")) {
        throw error;
      }
    }

    this.initialized = true;
  }

  /** An upsert that would push the snapshot over `maxBytes` leaves memory as it was. */
  async upsertChunks(records: EmbeddedChunkRecord[]): Promise<UpsertResult[]> {
    await this.initialize();
    const previous = this.exportSnapshot();
    const results = await super.upsertChunks(records);

    let serialized: string;
    try {
      serialized = this.serialize();
    } catch (error) {
      this.importSnapshot(previous);
      throw error;
    }

    await this.enqueueWrite(() => this.writeSerialized(serialized));
    return results;
  }

  async search(input: VectorSearchInput): Promise<SearchHit[]> {
    await this.initialize();
    return super.search(input);
  }

  async stats(): Promise<GraphStoreStats> {
    await this.initialize();
    return super.stats();
  }

  async getStorageInfo(): Promise<GraphStorageInfo> {
    await this.initialize();
    const stats = await this.readStorageStat();
    return {
      path: this.absolutePath,
      exists: stats.exists,
      format_version: CURRENT_FORMAT_VERSION,
      max_bytes: this.options.maxBytes,
      size_bytes: stats.sizeBytes,
    };
  }

  async close(): Promise<void> {
    if (!this.initialized) {
      return;
    }
    await this.enqueueWrite(() => this.writeSerialized(this.serialize()));
  }

  private enqueueWrite(task: () => Promise<void>): Promise<void> {
    this.writeChain = this.writeChain.then(task, task);
    return this.writeChain;
  }

  private serialize(): string {
    const payload: PersistedGraph = {
      format_version: CURRENT_FORMAT_VERSION,
      saved_at: new Date().toISOString(),
      snapshot: this.exportSnapshot(),
    };

    const serialized = JSON.stringify(payload);
    const bytes = Buffer.byteLength(serialized, "utf-8");
    if (bytes > this.options.maxBytes) {
      throw new UploadError(
        `Graph snapshot exceeds size limit (${bytes} > ${this.options.maxBytes} bytes).`,
      );
    }
    return serialized;
  }

  private async writeSerialized(serialized: string): Promise<void> {
    await fs.mkdir(path.dirname(this.absolutePath), { recursive: true });
    const tempPath = `${this.absolutePath}.tmp`;
    await fs.writeFile(tempPath, serialized, "utf-8");
    await replaceFileSafely(tempPath, this.absolutePath, serialized);
  }

  private async readStorageStat(): Promise<{ exists: boolean; sizeBytes: number }> {
    try {
      const stat = await fs.stat(this.absolutePath);
      return { exists: true, sizeBytes: stat.size };
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        return { exists: false, sizeBytes: 0 };
      }
      throw error;
    }
  }
}

function hasErrorCode(error: unknown, ...codes: string[]): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string" &&
    codes.includes(error.code)
  );
}

async function replaceFileSafely(
  tempPath: string,
  targetPath: string,
  content: string,
): Promise<void> {
  try {
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!hasErrorCode(error, "EPERM", "EEXIST", "EBUSY")) {
      throw error;
    }
  }

  try {
    await fs.rm(targetPath, { force: true });
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!hasErrorCode(error, "EPERM", "EEXIST", "EBUSY")) {
      throw error;
    }
  }

  // Windows can keep the target locked; fall back to an in-place write.
  await fs.writeFile(targetPath, content, "utf-8");
  await fs.rm(tempPath, { force: true });
}

function parseSnapshotFromDisk(raw: unknown): InMemoryGraphSnapshot {
  const envelope = persistedSchema.safeParse(raw);
  if (!envelope.success) {
    throw new Error("Invalid graph snapshot format.");
  }
  if (envelope.data.format_version !== CURRENT_FORMAT_VERSION) {
    throw new Error(
      `Unsupported graph snapshot format version: ${envelope.data.format_version}. Expected ${CURRENT_FORMAT_VERSION}.`,
    );
  }

  const snapshot = snapshotSchema.safeParse(envelope.data.snapshot);
  if (!snapshot.success) {
    throw new Error("Invalid graph snapshot contents.");
  }
  return snapshot.data;
}
