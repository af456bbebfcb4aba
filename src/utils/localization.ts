import { isRecord } from './json';

export type Translations = Record<string, unknown>;

const MONTHS_BY_LANGUAGE: Record<string, readonly string[]> = {
  pt: ['Jan', 'Fev', 'Mar', 'Abr', 'Mai', 'Jun', 'Jul', 'Ago', 'Set', 'Out', 'Nov', 'Dez'],
  en: ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'],
};

const LANGUAGE_VARIANT_KEYS = ['pt', 'en', 'default'];

// The only markup the document builder understands inside user text.
const PRESERVED_TAG_PATTERN = /(<\/?[biu]>)/;

export const LINE_BREAK_TAG = '<br/>';

function isPresent(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (typeof value === 'string') return value.trim() !== '';
  if (Array.isArray(value)) return value.length > 0;
  if (isRecord(value)) return Object.keys(value).length > 0;
  return true;
}

function containsLanguageVariants(value: unknown): value is Record<string, unknown> {
  return isRecord(value) && LANGUAGE_VARIANT_KEYS.some((key) => key in value);
}

/**
 * Pick the best value out of a `{ pt, en, default, ... }` map: the requested
 * language, then Portuguese, then English, then `default`, then whatever else
 * the map holds.
 */
function selectLanguageVariant(variants: Record<string, unknown>, language: string): unknown {
  const lookupOrder = [language];
  if (language !== 'pt') lookupOrder.push('pt');
  if (language !== 'en') lookupOrder.push('en');
  lookupOrder.push('default');

  for (const key of lookupOrder) {
    if (isPresent(variants[key])) return variants[key];
  }
  for (const [key, value] of Object.entries(variants)) {
    if (!lookupOrder.includes(key) && isPresent(value)) return value;
  }
  for (const key of lookupOrder) {
    if (key in variants) return variants[key];
  }

  const leftovers = Object.values(variants);
  return leftovers.length ? leftovers[0] : null;
}

function toDisplayString(value: unknown, fallback: string): string {
  if (typeof value === 'string') return value.trim() || fallback;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value).trim() || fallback;
  }
  return fallback;
}

function toStringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((entry) => entry !== null && entry !== undefined).map((entry) => String(entry));
}

function firstPresent(...candidates: unknown[]): unknown {
  return candidates.find((candidate) => isPresent(candidate)) ?? null;
}

function legacyCandidates(item: Record<string, unknown>, fieldName: string, language: string): unknown[] {
  return [
    item[`${fieldName}_${language}`],
    language !== 'pt' ? item[`${fieldName}_pt`] : null,
    item[fieldName],
  ];
}

export function resolveField(item: unknown, fieldName: string, language: string, fallback = ''): string {
  if (!isRecord(item)) return fallback;

  const fieldValue = item[fieldName];
  if (containsLanguageVariants(fieldValue)) {
    return toDisplayString(selectLanguageVariant(fieldValue, language), fallback);
  }

  return toDisplayString(firstPresent(...legacyCandidates(item, fieldName, language)), fallback);
}

export function resolveList(item: unknown, fieldName: string, language: string): string[] {
  if (!isRecord(item)) return [];

  const fieldValue = item[fieldName];
  if (containsLanguageVariants(fieldValue)) {
    return toStringList(selectLanguageVariant(fieldValue, language));
  }

  return toStringList(firstPresent(...legacyCandidates(item, fieldName, language)));
}

/**
 * Look up `catalog[section][key]`. Accepts both the legacy catalog keyed by
 * language at the top level and the unified one with per-key language maps.
 */
export function resolveTranslation(
  catalog: Translations,
  language: string,
  section: string,
  key: string,
  fallback: string,
): string {
  const languageScope = catalog[language];
  if (isRecord(languageScope)) {
    const sectionScope = languageScope[section];
    return isRecord(sectionScope) ? toDisplayString(sectionScope[key], fallback) : fallback;
  }

  const sectionScope = catalog[section];
  if (!isRecord(sectionScope)) return fallback;

  const translated = sectionScope[key];
  if (containsLanguageVariants(translated)) {
    return toDisplayString(selectLanguageVariant(translated, language), fallback);
  }
  return toDisplayString(translated, fallback);
}

function parseMonthNumber(rawMonth: unknown): number | null {
  if (typeof rawMonth === 'number') return Number.isInteger(rawMonth) ? rawMonth : null;
  if (typeof rawMonth !== 'string') return null;
  const trimmed = rawMonth.trim();
  return /^[+-]?\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : null;
}

function toRawString(value: unknown): string {
  if (value === null || value === undefined) return '';
  return String(value);
}

export function formatMonth(rawMonth: unknown, language: string): string {
  const month = parseMonthNumber(rawMonth);
  if (month === null || month < 1 || month > 12) return toRawString(rawMonth);

  const months = MONTHS_BY_LANGUAGE[language] ?? MONTHS_BY_LANGUAGE.pt;
  return months[month - 1];
}

export type PeriodInput = {
  startMonth: unknown;
  startYear: unknown;
  endMonth: unknown;
  endYear: unknown;
};

function isTruthy(value: unknown): boolean {
  if (typeof value === 'string') return value !== '';
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
  return Boolean(value);
}

export function formatPeriod(period: PeriodInput, catalog: Translations, language: string): string {
  const start = `${formatMonth(period.startMonth, language)} ${toRawString(period.startYear)}`.trim();

  if (isTruthy(period.endMonth) && isTruthy(period.endYear)) {
    return `${start} - ${formatMonth(period.endMonth, language)} ${toRawString(period.endYear)}`.trim();
  }

  const current = resolveTranslation(catalog, language, 'labels', 'current', 'Present');
  return `${start} - ${current}`.trim();
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function escapePreservingTags(rawText: unknown): string {
  return toRawString(rawText)
    .split(PRESERVED_TAG_PATTERN)
    .map((part, index) => (index % 2 === 1 ? part : escapeXml(part)))
    .join('');
}

export function escapeAttribute(rawValue: unknown): string {
  return escapeXml(toRawString(rawValue));
}

export function processRichText(rawText: unknown): string {
  return escapePreservingTags(rawText).replace(/\n/g, LINE_BREAK_TAG);
}

/**
 * Reduce a value to `[A-Za-z0-9._-]` so it can be used as part of a file name.
 * The result never contains a path separator or a `..` sequence.
 */
export function sanitizeFilenameComponent(rawValue: unknown, fallback = 'CV'): string {
  const replaced = toRawString(rawValue).trim().replace(/[^A-Za-z0-9._-]+/g, '_');
  const collapsed = replaced.replace(/\.{2,}/g, '.');
  const trimmed = collapsed.replace(/^[._-]+|[._-]+$/g, '');
  return trimmed || fallback;
}
