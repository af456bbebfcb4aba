import * as colorString from 'color-string';

/**
 * Normalise a colour string (any CSS colour name, `#rgb`, `#rrggbb`,
 * `rgb(...)` or `0xrrggbb`) to lower-case `#rrggbb`. Returns null when the
 * value is not a colour.
 */
export function parseColor(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const text = value.trim().toLowerCase();
  if (!text) return null;

  const rgb = colorString.get.rgb(text.startsWith('0x') ? `#${text.slice(2)}` : text);
  if (!rgb) return null;

  const [r, g, b] = rgb;
  return colorString.to.hex(r, g, b).toLowerCase();
}
