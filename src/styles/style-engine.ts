import { PdfRenderError } from '../utils/errors';
import { isRecord } from '../utils/json';
import { parseColor } from './colors';
import { buildStylesheet, type Stylesheet } from './stylesheet';

export const REQUIRED_PARAGRAPH_STYLE_NAMES = [
  'NameStyle',
  'TitleStyle',
  'SectionTitleStyle',
  'ItemTitleStyle',
  'ItemSubtitleStyle',
  'BodyStyle',
  'ContactStyle',
  'DateStyle',
] as const;

export const REQUIRED_MARGIN_KEYS = ['top', 'bottom', 'left', 'right'] as const;

export const REQUIRED_SPACING_KEYS = [
  'header_bottom',
  'section_bottom',
  'item_bottom',
  'small_bottom',
  'minimal_bottom',
] as const;

export type ParagraphStyleName = (typeof REQUIRED_PARAGRAPH_STYLE_NAMES)[number];
export type MarginKey = (typeof REQUIRED_MARGIN_KEYS)[number];
export type SpacingKey = (typeof REQUIRED_SPACING_KEYS)[number];

export type StyleConfiguration = Record<string, unknown>;

function requireSection(config: StyleConfiguration, sectionKey: string): Record<string, unknown> {
  const section = config[sectionKey];
  if (!isRecord(section)) {
    throw new PdfRenderError(`Style configuration missing '${sectionKey}' dictionary in styles.json`);
  }
  return section;
}

function requireNumericValue(config: StyleConfiguration, sectionKey: string, key: string): number {
  const section = requireSection(config, sectionKey);
  const value = section[key];
  if (value === null || value === undefined) {
    throw new PdfRenderError(`Style configuration missing '${sectionKey}.${key}' in styles.json`);
  }

  const n = typeof value === 'number' ? value : typeof value === 'string' && value.trim() ? Number(value) : NaN;
  if (!Number.isFinite(n)) {
    throw new PdfRenderError(`Style configuration value '${sectionKey}.${key}' must be a number in styles.json`);
  }
  return n;
}

function requireSocialLinkColor(config: StyleConfiguration): string {
  const links = requireSection(config, 'links');
  const color = links.social_link_color;
  if (typeof color !== 'string' || !color.trim()) {
    throw new PdfRenderError("Style configuration missing 'links.social_link_color' in styles.json");
  }
  if (!parseColor(color)) {
    throw new PdfRenderError(`Style configuration has invalid 'links.social_link_color': ${color}`);
  }
  return color.trim();
}

/**
 * Check every block the renderer relies on. Missing paragraph styles are
 * reported together; margin, spacing, link and paragraph field problems stop
 * at the first one.
 */
export function validateStyleConfiguration(config: unknown): asserts config is StyleConfiguration {
  if (!isRecord(config)) {
    throw new PdfRenderError('Style configuration must be a JSON object');
  }

  const paragraphStyles = requireSection(config, 'paragraph_styles');
  const missingStyles = REQUIRED_PARAGRAPH_STYLE_NAMES.filter((name) => !(name in paragraphStyles));
  if (missingStyles.length) {
    throw new PdfRenderError(`Style configuration missing required paragraph styles: ${missingStyles.join(', ')}`);
  }

  for (const key of REQUIRED_MARGIN_KEYS) requireNumericValue(config, 'margins', key);
  for (const key of REQUIRED_SPACING_KEYS) requireNumericValue(config, 'spacing', key);
  requireSocialLinkColor(config);
  buildStylesheet(paragraphStyles);
}

export type PageMargins = Record<MarginKey, number>;

/**
 * Typed access to a validated style configuration.
 */
export class PdfStyleEngine {
  private readonly config: StyleConfiguration;

  constructor(config: unknown) {
    validateStyleConfiguration(config);
    this.config = config;
  }

  buildStylesheet(): Stylesheet {
    return buildStylesheet(requireSection(this.config, 'paragraph_styles'));
  }

  margin(key: MarginKey): number {
    return requireNumericValue(this.config, 'margins', key);
  }

  margins(): PageMargins {
    return {
      top: this.margin('top'),
      bottom: this.margin('bottom'),
      left: this.margin('left'),
      right: this.margin('right'),
    };
  }

  spacing(key: SpacingKey): number {
    return requireNumericValue(this.config, 'spacing', key);
  }

  socialLinkColor(): string {
    return requireSocialLinkColor(this.config);
  }
}
