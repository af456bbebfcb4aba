import PDFDocument from 'pdfkit';

import type { PageMargins } from '../styles/style-engine';
import type { ParagraphStyle, Stylesheet } from '../styles/stylesheet';
import { PdfRenderError } from './errors';
import type { DocumentBlock, ParagraphBlock } from './pdf-blocks';
import { parseMarkup, toPlainText, type MarkupRun } from './pdf-markup';

// Points per millimetre
export const MM = 72 / 25.4;

const FONT_FAMILIES: Array<{ prefix: string; variants: [string, string, string, string] }> = [
  { prefix: 'Helvetica', variants: ['Helvetica', 'Helvetica-Bold', 'Helvetica-Oblique', 'Helvetica-BoldOblique'] },
  { prefix: 'Times', variants: ['Times-Roman', 'Times-Bold', 'Times-Italic', 'Times-BoldItalic'] },
  { prefix: 'Courier', variants: ['Courier', 'Courier-Bold', 'Courier-Oblique', 'Courier-BoldOblique'] },
];

/**
 * Pick the face of a standard PDF font family for a run. Fonts outside the
 * built-in families are used as given.
 */
export function resolveFontVariant(fontName: string, bold: boolean, italic: boolean): string {
  const family = FONT_FAMILIES.find((f) => fontName.startsWith(f.prefix));
  if (!family) return fontName;

  const isBold = bold || /Bold/.test(fontName);
  const isItalic = italic || /Oblique|Italic/.test(fontName);
  const [regular, boldFace, italicFace, boldItalicFace] = family.variants;
  if (isBold && isItalic) return boldItalicFace;
  if (isBold) return boldFace;
  if (isItalic) return italicFace;
  return regular;
}

export type InlinePiece<R> = { run: R; text: string; width: number };

// Breakable spaces only: no-break spaces stay inside their word.
const BREAKABLE_SPACE = /^[ \t]+$/;

const isBreakableSpace = (text: string) => BREAKABLE_SPACE.test(text);

/** Split run text into words, space runs and `\n` breaks. */
export function splitInlineText(text: string): string[] {
  return text.split(/(\n|[ \t]+)/).filter((token) => token.length > 0);
}

function trimTrailingSpace<R>(line: InlinePiece<R>[]): InlinePiece<R>[] {
  let end = line.length;
  while (end > 0 && isBreakableSpace(line[end - 1].text)) end -= 1;
  return line.slice(0, end);
}

/**
 * Greedy line breaking over measured pieces. Spaces never start a line and
 * are dropped at line ends; a `\n` piece forces a break. A single word
 * wider than `width` keeps a line of its own.
 */
export function breakInlineLines<R>(pieces: InlinePiece<R>[], width: number): InlinePiece<R>[][] {
  const lines: InlinePiece<R>[][] = [];
  let line: InlinePiece<R>[] = [];
  let lineWidth = 0;

  const flush = () => {
    lines.push(trimTrailingSpace(line));
    line = [];
    lineWidth = 0;
  };

  for (const piece of pieces) {
    if (piece.text === '\n') {
      flush();
      continue;
    }
    const isSpace = isBreakableSpace(piece.text);
    if (isSpace && line.length === 0) continue;
    if (!isSpace && line.length > 0 && lineWidth + piece.width > width) flush();
    line.push(piece);
    lineWidth += piece.width;
  }
  if (line.length) flush();

  return lines;
}

export type RenderBlocksOptions = {
  blocks: DocumentBlock[];
  stylesheet: Stylesheet;
  margins: PageMargins;
  title?: string | null;
};

export async function renderBlocksToPdf(options: RenderBlocksOptions): Promise<Buffer> {
  const { stylesheet } = options;

  const doc = new PDFDocument({
    size: 'A4',
    margins: {
      top: options.margins.top * MM,
      bottom: options.margins.bottom * MM,
      left: options.margins.left * MM,
      right: options.margins.right * MM,
    },
    info: { Title: options.title?.trim() || 'Curriculum Vitae' },
  });

  const chunks: Buffer[] = [];
  doc.on('data', (c) => chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(c)));

  const done = new Promise<Buffer>((resolve, reject) => {
    doc.on('end', () => resolve(Buffer.concat(chunks)));
    doc.on('error', (err) => reject(err));
  });

  const left = doc.page.margins.left;
  const contentWidth = doc.page.width - left - doc.page.margins.right;
  const bottomLimit = () => doc.page.height - doc.page.margins.bottom;
  let pageBreakPending = false;

  const applyRunStyle = (style: ParagraphStyle, run: MarkupRun) => {
    doc
      .font(resolveFontVariant(style.fontName, run.bold, run.italic))
      .fontSize(style.fontSize)
      .fillColor(run.color ?? style.textColor);
  };

  const keepWithNext = (style: ParagraphStyle, text: string, width: number) => {
    doc.font(style.fontName).fontSize(style.fontSize);
    const needed = doc.heightOfString(text, { width }) + style.leading * 2;
    if (doc.y + needed > bottomLimit()) doc.addPage();
  };

  const drawUnderline = (x: number, y: number, width: number, color: string) => {
    const thickness = Math.max(0.5, doc.currentLineHeight() / 20);
    const lineY = y + doc.currentLineHeight() - thickness;
    doc.save().lineWidth(thickness).strokeColor(color).moveTo(x, lineY).lineTo(x + width, lineY).stroke().restore();
  };

  // Paragraphs carrying links are laid out word by word so each link
  // annotation covers only its own text.
  const renderInlineText = (style: ParagraphStyle, runs: MarkupRun[], x: number, width: number) => {
    const pieces = runs.flatMap((run) => {
      applyRunStyle(style, run);
      return splitInlineText(run.text).map((text): InlinePiece<MarkupRun> => ({
        run,
        text,
        width: text === '\n' ? 0 : doc.widthOfString(text),
      }));
    });

    for (const line of breakInlineLines(pieces, width)) {
      const lineWidth = line.reduce((sum, piece) => sum + piece.width, 0);
      let cursor = x;
      if (style.alignment === 'center') cursor = x + Math.max(0, (width - lineWidth) / 2);
      else if (style.alignment === 'right') cursor = x + Math.max(0, width - lineWidth);

      if (doc.y + style.leading > bottomLimit()) doc.addPage();
      const y = doc.y;
      for (const piece of line) {
        applyRunStyle(style, piece.run);
        doc.text(piece.text, cursor, y, { lineBreak: false });
        if (piece.run.underline) drawUnderline(cursor, y, piece.width, piece.run.color ?? style.textColor);
        if (piece.run.link) doc.link(cursor, y, piece.width, doc.currentLineHeight(), piece.run.link);
        cursor += piece.width;
      }
      doc.y = y + style.leading;
    }
  };

  const renderFlowingText = (style: ParagraphStyle, runs: MarkupRun[], x: number, width: number) => {
    const lineGap = Math.max(0, style.leading - style.fontSize * 1.15);
    runs.forEach((run, index) => {
      applyRunStyle(style, run);
      const textOptions = {
        width,
        align: style.alignment,
        lineGap,
        underline: run.underline,
        continued: index < runs.length - 1,
      };
      if (index === 0) doc.text(run.text, x, doc.y, textOptions);
      else doc.text(run.text, textOptions);
    });
  };

  const renderParagraph = (block: ParagraphBlock) => {
    const style = stylesheet.get(block.style);
    if (!style) throw new PdfRenderError(`Unknown paragraph style: ${block.style}`);

    const runs = parseMarkup(block.markup);
    const text = toPlainText(runs);
    if (!text.trim()) return;

    const x = left + style.leftIndent;
    const width = Math.max(1, contentWidth - style.leftIndent);

    // A spacer that ran past the page end moves the next paragraph over.
    if (pageBreakPending) {
      doc.addPage();
      pageBreakPending = false;
    }

    doc.y += style.spaceBefore;
    if (style.keepWithNext) keepWithNext(style, text, width);

    if (runs.some((run) => run.link)) renderInlineText(style, runs, x, width);
    else renderFlowingText(style, runs, x, width);

    doc.y += style.spaceAfter;
    doc.x = left;
  };

  for (const block of options.blocks) {
    if (block.kind === 'spacer') {
      const height = block.height * MM;
      if (doc.y + height > bottomLimit()) pageBreakPending = true;
      else doc.y += height;
      continue;
    }
    renderParagraph(block);
  }

  doc.end();
  return done;
}
