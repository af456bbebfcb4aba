import { describe, expect, it } from 'vitest';

import { PdfRenderError } from '../utils/errors';
import { parseColor } from './colors';
import { buildStylesheet, resolveAlignment } from './stylesheet';

describe('parseColor', () => {
  it('normalises names and hex notations', () => {
    expect(parseColor('Blue')).toBe('#0000ff');
    expect(parseColor('#ABC')).toBe('#aabbcc');
    expect(parseColor('0x112233')).toBe('#112233');
    expect(parseColor(' #888888 ')).toBe('#888888');
  });

  it('knows the full CSS colour name set and rgb() notation', () => {
    expect(parseColor('darkslategray')).toBe('#2f4f4f');
    expect(parseColor('SteelBlue')).toBe('#4682b4');
    expect(parseColor('rgb(255, 0, 0)')).toBe('#ff0000');
  });

  it('rejects anything else', () => {
    expect(parseColor('nope')).toBeNull();
    expect(parseColor('#12345')).toBeNull();
    expect(parseColor(5)).toBeNull();
  });
});

describe('resolveAlignment', () => {
  it('maps names case-insensitively and defaults to left', () => {
    expect(resolveAlignment('Justify')).toBe('justify');
    expect(resolveAlignment('CENTER')).toBe('center');
    expect(resolveAlignment('middle')).toBe('left');
    expect(resolveAlignment(42)).toBe('left');
  });
});

describe('buildStylesheet', () => {
  it('applies definitions on top of Normal', () => {
    const styles = buildStylesheet({
      Custom: { font_size: 12, text_color: '#abc', alignment: 'CENTER', keep_with_next: true, space_after: 3 },
    });
    const custom = styles.get('Custom');
    expect(custom).toMatchObject({
      name: 'Custom',
      parent: 'Normal',
      fontName: 'Helvetica',
      fontSize: 12,
      textColor: '#aabbcc',
      alignment: 'center',
      keepWithNext: true,
      spaceBefore: 0,
      spaceAfter: 3,
    });
    expect(custom?.leading).toBeCloseTo(14.4);
  });

  it('inherits from base styles and earlier custom styles', () => {
    const styles = buildStylesheet({
      Base: { parent: 'Heading1', font_name: 'Times-Roman', font_size: 11 },
      Child: { parent: 'Base', left_indent: 5 },
      Orphan: { parent: 'Missing' },
    });
    expect(styles.get('Base')).toMatchObject({ parent: 'Heading1', fontName: 'Times-Roman', spaceAfter: 6 });
    expect(styles.get('Child')).toMatchObject({ parent: 'Base', fontName: 'Times-Roman', fontSize: 11, leftIndent: 5 });
    expect(styles.get('Orphan')).toMatchObject({ parent: 'Normal', fontSize: 10 });
  });

  it('does not redefine base styles', () => {
    const styles = buildStylesheet({ Normal: { font_size: 99 } });
    expect(styles.get('Normal')?.fontSize).toBe(10);
  });

  it('rejects invalid colours and numbers', () => {
    expect(() => buildStylesheet({ X: { text_color: 'notacolor' } })).toThrow('Invalid paragraph style color: notacolor');
    expect(() => buildStylesheet({ X: { text_color: 7 } })).toThrow(PdfRenderError);
    expect(() => buildStylesheet({ X: { font_size: 'big' } })).toThrow(
      "Paragraph style 'X' field 'font_size' must be a number",
    );
  });
});
