import { promises as fs } from "node:fs";
import path from "node:path";
import { promisify } from "node:util";
import { gunzip, gzip } from "node:zlib";
import { ZodType, ZodTypeDef } from "zod";
import { ArtifactError, toFailureReason } from "../../domain/errors.js";

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

export interface InvalidLine {
  line: number;
  reason: string;
}

export interface ReadArtifactResult<T> {
  records: T[];
  invalid: InvalidLine[];
}

export function isGzipPath(filePath: string): boolean {
  return filePath.endsWith(".gz");
}

/**
 * Writes one JSON object per line, gzip-compressed when the path ends in `.gz`.
 * Goes through a temp file so a crashed run never leaves a half-written artifact.
 */
export async function writeJsonl(filePath: string, records: readonly unknown[]): Promise<number> {
  const absolutePath = path.resolve(filePath);
  const tempPath = `${absolutePath}.tmp`;

  try {
    await fs.mkdir(path.dirname(absolutePath), { recursive: true });
    const body = records.map((record) => `${JSON.stringify(record)}\n`).join("");
    const payload = isGzipPath(absolutePath)
      ? await gzipAsync(Buffer.from(body, "utf-8"))
      : Buffer.from(body, "utf-8");
    await fs.writeFile(tempPath, payload);
    await fs.rename(tempPath, absolutePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw new ArtifactError(filePath, `Cannot write artifact ${filePath}: ${toFailureReason(error)}`, {
      cause: error,
    });
  }

  return records.length;
}

/**
 * Reads a JSON Lines artifact and validates every line against `schema`.
 * Blank lines are ignored; lines that fail to parse or validate are reported
 * in `invalid`. A missing or undecodable file rejects with ArtifactError.
 */
export async function readJsonl<T>(
  filePath: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<ReadArtifactResult<T>> {
  const content = await readArtifactText(filePath);
  const records: T[] = [];
  const invalid: InvalidLine[] = [];

  const lines = content.split("\n");
  for (let index = 0; index < lines.length; index += 1) {
    const line = lines[index].trim();
    if (!line) {
      continue;
    }

    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch {
      invalid.push({ line: index + 1, reason: "invalid JSON" });
      continue;
    }

    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      invalid.push({
        line: index + 1,
        reason: parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
          .join("; "),
      });
      continue;
    }
    records.push(parsed.data);
  }

  return { records, invalid };
}

async function readArtifactText(filePath: string): Promise<string> {
  let raw: Buffer;
  try {
    raw = await fs.readFile(path.resolve(filePath));
  } catch (error) {
    throw new ArtifactError(filePath, `Cannot read artifact ${filePath}: ${toFailureReason(error)}`, {
      cause: error,
    });
  }

  if (!isGzipPath(filePath)) {
    return raw.toString("utf-8");
  }

  try {
    return (await gunzipAsync(raw)).toString("utf-8");
  } catch (error) {
    throw new ArtifactError(filePath, `Cannot decompress artifact ${filePath}: ${toFailureReason(error)}`, {
      cause: error,
    });
  }
}
