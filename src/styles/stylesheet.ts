import { PdfRenderError } from '../utils/errors';
import { isRecord } from '../utils/json';
import { parseColor } from './colors';

export type Alignment = 'left' | 'center' | 'right' | 'justify';

export type ParagraphStyle = {
  name: string;
  parent: string | null;
  fontName: string;
  fontSize: number;
  leading: number;
  textColor: string;
  spaceBefore: number;
  spaceAfter: number;
  leftIndent: number;
  alignment: Alignment;
  keepWithNext: boolean;
};

export type Stylesheet = Map<string, ParagraphStyle>;

const ALIGNMENTS: readonly Alignment[] = ['left', 'center', 'right', 'justify'];

const NORMAL_STYLE: ParagraphStyle = {
  name: 'Normal',
  parent: null,
  fontName: 'Helvetica',
  fontSize: 10,
  leading: 12,
  textColor: '#000000',
  spaceBefore: 0,
  spaceAfter: 0,
  leftIndent: 0,
  alignment: 'left',
  keepWithNext: false,
};

function derive(parent: ParagraphStyle, name: string, overrides: Partial<ParagraphStyle>): ParagraphStyle {
  return { ...parent, ...overrides, name, parent: parent.name };
}

export function createBaseStylesheet(): Stylesheet {
  const bodyText = derive(NORMAL_STYLE, 'BodyText', { spaceBefore: 6 });
  const base: ParagraphStyle[] = [
    NORMAL_STYLE,
    bodyText,
    derive(bodyText, 'Italic', { fontName: 'Helvetica-Oblique' }),
    derive(NORMAL_STYLE, 'Heading1', { fontName: 'Helvetica-Bold', fontSize: 18, leading: 22, spaceAfter: 6 }),
    derive(NORMAL_STYLE, 'Heading2', {
      fontName: 'Helvetica-Bold',
      fontSize: 14,
      leading: 18,
      spaceBefore: 12,
      spaceAfter: 6,
    }),
    derive(NORMAL_STYLE, 'Title', {
      fontName: 'Helvetica-Bold',
      fontSize: 18,
      leading: 22,
      alignment: 'center',
      spaceAfter: 6,
    }),
  ];
  return new Map(base.map((style) => [style.name, { ...style }]));
}

export function resolveAlignment(value: unknown): Alignment {
  if (typeof value !== 'string') return 'left';
  const normalized = value.trim().toLowerCase();
  return ALIGNMENTS.find((alignment) => alignment === normalized) ?? 'left';
}

function requireNumber(styleName: string, field: string, value: unknown): number {
  const n = typeof value === 'number' ? value : typeof value === 'string' && value.trim() ? Number(value) : NaN;
  if (!Number.isFinite(n)) {
    throw new PdfRenderError(`Paragraph style '${styleName}' field '${field}' must be a number`);
  }
  return n;
}

function requireColor(value: unknown): string {
  if (typeof value !== 'string' || !value.trim()) {
    throw new PdfRenderError("Paragraph style 'text_color' must be a non-empty string");
  }
  const color = parseColor(value);
  if (!color) throw new PdfRenderError(`Invalid paragraph style color: ${value}`);
  return color;
}

function applyDefinition(style: ParagraphStyle, definition: Record<string, unknown>): ParagraphStyle {
  const name = style.name;
  const next = { ...style };

  if ('font_name' in definition) {
    const fontName = definition.font_name;
    if (typeof fontName !== 'string' || !fontName.trim()) {
      throw new PdfRenderError(`Paragraph style '${name}' field 'font_name' must be a non-empty string`);
    }
    next.fontName = fontName.trim();
  }
  if ('font_size' in definition) {
    next.fontSize = requireNumber(name, 'font_size', definition.font_size);
    next.leading = next.fontSize * 1.2;
  }
  if ('leading' in definition) next.leading = requireNumber(name, 'leading', definition.leading);
  if ('text_color' in definition) next.textColor = requireColor(definition.text_color);
  if ('space_before' in definition) next.spaceBefore = requireNumber(name, 'space_before', definition.space_before);
  if ('space_after' in definition) next.spaceAfter = requireNumber(name, 'space_after', definition.space_after);
  if ('left_indent' in definition) next.leftIndent = requireNumber(name, 'left_indent', definition.left_indent);
  if ('alignment' in definition) next.alignment = resolveAlignment(definition.alignment);
  if ('keep_with_next' in definition) next.keepWithNext = Boolean(definition.keep_with_next);

  return next;
}

/**
 * Turn the `paragraph_styles` map into renderable styles. Each style inherits
 * from its `parent` (a base style or a custom style defined earlier in the
 * map), falling back to `Normal`. Names that already exist in the base
 * stylesheet are left untouched.
 */
export function buildStylesheet(paragraphStyles: Record<string, unknown>): Stylesheet {
  const stylesheet = createBaseStylesheet();
  const normal = stylesheet.get('Normal') ?? NORMAL_STYLE;

  for (const [styleName, definition] of Object.entries(paragraphStyles)) {
    if (!isRecord(definition)) continue;
    if (stylesheet.has(styleName)) continue;

    const parentName = typeof definition.parent === 'string' ? definition.parent : 'Normal';
    const parent = stylesheet.get(parentName) ?? normal;
    stylesheet.set(styleName, applyDefinition({ ...parent, name: styleName, parent: parent.name }, definition));
  }

  return stylesheet;
}
