import fs from 'node:fs/promises';
import path from 'node:path';

import { JsonFileNotFoundError, JsonParsingError } from './errors';

export type JsonObject = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function safeJsonParse<T = unknown>(input: string): { ok: true; value: T } | { ok: false; error: Error } {
  try {
    return { ok: true, value: JSON.parse(input) as T };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
  }
}

export function isMissingFileError(error: unknown): boolean {
  return isRecord(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

/**
 * Read a JSON document whose top level must be an object.
 */
export async function loadJsonDocument(filePath: string, encoding: BufferEncoding = 'utf-8'): Promise<JsonObject> {
  const resolvedPath = path.resolve(filePath);

  let raw: string;
  try {
    raw = await fs.readFile(resolvedPath, { encoding });
  } catch (error) {
    if (isMissingFileError(error)) throw new JsonFileNotFoundError(`JSON file not found: ${resolvedPath}`);
    throw error;
  }

  const parsed = safeJsonParse(raw.replace(/^\uFEFF/, ''));
  if (!parsed.ok) {
    throw new JsonParsingError(`Invalid JSON file: ${resolvedPath}`, { cause: parsed.error });
  }
  if (!isRecord(parsed.value)) {
    throw new JsonParsingError(`Top-level JSON value must be an object: ${resolvedPath}`);
  }

  return parsed.value;
}
