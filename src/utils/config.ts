import fs from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

import { ConfigurationError } from './errors';
import { isMissingFileError, isRecord, safeJsonParse } from './json';

const nonBlank = z.string().trim().min(1);

const languageMapSchema = z
  .record(z.string(), z.unknown())
  .superRefine((mapping, ctx) => {
    if (!Object.keys(mapping).length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'cannot be empty' });
    }
    for (const [language, filePath] of Object.entries(mapping)) {
      if (typeof filePath !== 'string' || !filePath.trim()) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `has invalid path for language '${language}'` });
      }
    }
  })
  .transform((mapping) =>
    Object.fromEntries(Object.entries(mapping).map(([language, filePath]) => [language.toLowerCase(), String(filePath)])),
  );

const filesSchema = z.object({
  data: z.string().optional(),
  data_by_language: languageMapSchema.optional(),
  styles: z.string().optional(),
  translations: z.string().optional(),
  translations_by_language: languageMapSchema.optional(),
  output_dir: z.string().optional(),
});

const defaultsSchema = z
  .object({
    language: nonBlank.default('pt').transform((language) => language.toLowerCase()),
    encoding: nonBlank.default('utf-8'),
  })
  .default({});

const loggingSchema = z
  .object({
    enabled: z.boolean().default(true),
    level: nonBlank.default('info'),
    directory: nonBlank.default('logs'),
  })
  .default({});

const appConfigSchema = z.object({
  files: filesSchema,
  defaults: defaultsSchema,
  logging: loggingSchema,
});

export type FileSettings = {
  data: string | null;
  dataByLanguage: Record<string, string> | null;
  styles: string;
  translations: string | null;
  translationsByLanguage: Record<string, string> | null;
  outputDir: string;
};

export type AppConfig = {
  files: FileSettings;
  defaults: { language: string; encoding: BufferEncoding };
  logging: { enabled: boolean; level: string; directory: string };
};

function toStringOrNull(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

function toEncoding(value: string): BufferEncoding {
  const normalized = value.trim().toLowerCase();
  if (Buffer.isEncoding(normalized)) return normalized;
  throw new ConfigurationError(`Unsupported encoding in 'defaults.encoding': ${value}`);
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const key = issue.path.join('.');
      return key ? `'${key}' ${issue.message}` : issue.message;
    })
    .join('; ');
}

export function parseAppConfig(raw: unknown): AppConfig {
  if (!isRecord(raw) || !isRecord(raw.files)) {
    throw new ConfigurationError("Missing required 'files' section in config");
  }

  const parsed = appConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${describeIssues(parsed.error)}`);
  }

  const { files, defaults, logging } = parsed.data;
  const data = toStringOrNull(files.data);
  const translations = toStringOrNull(files.translations);
  const styles = toStringOrNull(files.styles);
  const outputDir = toStringOrNull(files.output_dir);

  const missing: string[] = [];
  if (!styles) missing.push('styles');
  if (!outputDir) missing.push('output_dir');
  if (!data && !files.data_by_language) missing.push('data or data_by_language');
  if (!translations && !files.translations_by_language) missing.push('translations or translations_by_language');
  if (missing.length || !styles || !outputDir) {
    throw new ConfigurationError(`Missing required config keys in 'files': ${missing.join(', ')}`);
  }

  return {
    files: {
      data,
      dataByLanguage: files.data_by_language ?? null,
      styles,
      translations,
      translationsByLanguage: files.translations_by_language ?? null,
      outputDir,
    },
    defaults: { language: defaults.language, encoding: toEncoding(defaults.encoding) },
    logging,
  };
}

export async function loadAppConfig(configFilePath: string): Promise<AppConfig> {
  const resolvedPath = path.resolve(configFilePath);

  let raw: string;
  try {
    raw = await fs.readFile(resolvedPath, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) throw new ConfigurationError(`Configuration file not found: ${resolvedPath}`);
    throw new ConfigurationError(`Configuration file could not be read: ${resolvedPath}`, { cause: error });
  }

  const parsed = safeJsonParse(raw.replace(/^\uFEFF/, ''));
  if (!parsed.ok) {
    throw new ConfigurationError(`Configuration file has invalid JSON: ${resolvedPath}`, { cause: parsed.error });
  }

  return parseAppConfig(parsed.value);
}
