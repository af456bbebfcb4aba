import fs from 'node:fs';
import fsp from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { vi } from 'vitest';

import { isRecord, type JsonObject } from '../utils/json';
import type { GenerationContext } from '../utils/logger';

export const PROJECT_ROOT = path.resolve(__dirname, '..', '..');

export function loadStyleConfiguration(): JsonObject {
  const raw = fs.readFileSync(path.join(PROJECT_ROOT, 'config', 'styles.json'), 'utf-8');
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) throw new Error('config/styles.json must hold an object');
  return parsed;
}

export function createFakeLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function createContext(language: string, logger = createFakeLogger()): GenerationContext {
  return { requestId: 'test0001', language, logger };
}

export async function makeTempDir(): Promise<string> {
  return fsp.mkdtemp(path.join(os.tmpdir(), 'cv-pdf-'));
}

export async function writeJson(filePath: string, value: unknown): Promise<void> {
  await fsp.mkdir(path.dirname(filePath), { recursive: true });
  await fsp.writeFile(filePath, JSON.stringify(value, null, 2), 'utf-8');
}
