import { describe, expect, it } from 'vitest';

import { buildStylesheet } from '../styles/stylesheet';
import { breakInlineLines, MM, renderBlocksToPdf, resolveFontVariant, splitInlineText } from './cv-pdf';
import { PdfRenderError } from './errors';
import { paragraph, spacer, type DocumentBlock } from './pdf-blocks';

const margins = { top: 19, bottom: 19, left: 19, right: 19 };

const stylesheet = buildStylesheet({
  Contact: { font_size: 11, alignment: 'center' },
  Heading: { font_size: 12, keep_with_next: true },
  Plain: { font_size: 10 },
});

async function render(blocks: DocumentBlock[]): Promise<string> {
  const pdf = await renderBlocksToPdf({ blocks, stylesheet, margins });
  return pdf.toString('latin1');
}

function countPages(pdf: string): number {
  return pdf.match(/\/Type \/Page\b/g)?.length ?? 0;
}

function linkRects(pdf: string): number[][] {
  return [...pdf.matchAll(/\/Rect \[([^\]]+)\]/g)].map((match) => match[1].split(' ').map(Number));
}

function piece(text: string, width: number) {
  return { run: 'run', text, width };
}

function lineTexts(lines: Array<Array<{ text: string }>>): string[][] {
  return lines.map((line) => line.map((p) => p.text));
}

describe('resolveFontVariant', () => {
  it('picks faces of the standard families', () => {
    expect(resolveFontVariant('Helvetica', true, false)).toBe('Helvetica-Bold');
    expect(resolveFontVariant('Helvetica-Bold', false, true)).toBe('Helvetica-BoldOblique');
    expect(resolveFontVariant('Times-Roman', false, false)).toBe('Times-Roman');
    expect(resolveFontVariant('Times-Roman', false, true)).toBe('Times-Italic');
    expect(resolveFontVariant('Courier', true, true)).toBe('Courier-BoldOblique');
    expect(resolveFontVariant('Courier-Oblique', false, false)).toBe('Courier-Oblique');
  });

  it('keeps other fonts as given', () => {
    expect(resolveFontVariant('Symbol', true, true)).toBe('Symbol');
  });
});

describe('splitInlineText', () => {
  it('separates words, spaces and breaks', () => {
    expect(splitInlineText('GitHub |  https://x.dev\nnext')).toEqual([
      'GitHub',
      ' ',
      '|',
      '  ',
      'https://x.dev',
      '\n',
      'next',
    ]);
    expect(splitInlineText('a\u00a0b c')).toEqual(['a\u00a0b', ' ', 'c']);
  });
});

describe('breakInlineLines', () => {
  it('wraps at the width and drops spaces at line edges', () => {
    const pieces = [piece('a', 4), piece(' ', 1), piece('b', 4), piece(' ', 1), piece('c', 4)];
    expect(lineTexts(breakInlineLines(pieces, 10))).toEqual([['a', ' ', 'b'], ['c']]);
  });

  it('breaks on newlines', () => {
    const pieces = [piece(' ', 1), piece('a', 4), piece('\n', 0), piece(' ', 1), piece('b', 4)];
    expect(lineTexts(breakInlineLines(pieces, 100))).toEqual([['a'], ['b']]);
  });

  it('gives an oversized word its own line', () => {
    expect(lineTexts(breakInlineLines([piece('a', 4), piece('long', 20)], 10))).toEqual([['a'], ['long']]);
    expect(lineTexts(breakInlineLines([piece('long', 20)], 10))).toEqual([['long']]);
  });
});

describe('renderBlocksToPdf', () => {
  it('renders a link paragraph with its annotation', async () => {
    const pdf = await render([
      paragraph('Contact', '<u>Site</u> <a href="https://github.com/x" color="blue">GitHub</a>'),
    ]);

    expect(pdf.startsWith('%PDF')).toBe(true);
    expect(pdf).toContain('/URI (https://github.com/x)');
    expect(pdf.match(/\/Subtype \/Link/g)?.length).toBe(1);
  });

  it('wraps long link lines inside the margins', async () => {
    const urls = ['one', 'two', 'three'].map((name) => `https://example.com/portfolio/projects/2024/long-path-${name}`);
    const markup = urls.map((url) => `<a href="${url}" color="blue">${url}</a>`).join(' | ');

    const pdf = await render([paragraph('Contact', markup)]);
    const rects = linkRects(pdf);
    const rightEdge = (210 - margins.right) * MM;

    expect(rects).toHaveLength(3);
    for (const [x1, , x2] of rects) {
      expect(Math.max(x1, x2)).toBeLessThanOrEqual(rightEdge + 0.01);
      expect(Math.min(x1, x2)).toBeGreaterThanOrEqual(margins.left * MM - 0.01);
    }
    expect(new Set(rects.map((rect) => rect[1])).size).toBe(3);
    expect(countPages(pdf)).toBe(1);
  });

  it('moves a keep-with-next paragraph that would end at the bottom margin', async () => {
    expect(countPages(await render([spacer(250), paragraph('Heading', 'Experience')]))).toBe(2);
    expect(countPages(await render([spacer(250), paragraph('Plain', 'Experience')]))).toBe(1);
  });

  it('starts a new page when a spacer runs past the page end', async () => {
    expect(countPages(await render([paragraph('Plain', 'First'), spacer(270), paragraph('Plain', 'Second')]))).toBe(2);
    expect(countPages(await render([paragraph('Plain', 'Only'), spacer(270)]))).toBe(1);
  });

  it('rejects unknown paragraph styles', async () => {
    await expect(render([paragraph('Missing', 'text')])).rejects.toThrow(
      new PdfRenderError('Unknown paragraph style: Missing'),
    );
  });
});
