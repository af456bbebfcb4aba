export type MarkupRun = {
  text: string;
  bold: boolean;
  italic: boolean;
  underline: boolean;
  link: string | null;
  color: string | null;
};

type LinkFrame = { href: string | null; color: string | null };

const TAG_PATTERN = /<(\/?)([a-zA-Z]+)((?:\s+[a-zA-Z_-]+\s*=\s*"[^"]*")*)\s*(\/?)>/g;
const ATTRIBUTE_PATTERN = /([a-zA-Z_-]+)\s*=\s*"([^"]*)"/g;

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: '\u00a0',
};

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-fA-F]+|#\d+|[a-zA-Z]+);/g, (whole: string, entity: string) => {
    if (entity.startsWith('#x') || entity.startsWith('#X')) {
      return fromCodePoint(Number.parseInt(entity.slice(2), 16), whole);
    }
    if (entity.startsWith('#')) {
      return fromCodePoint(Number.parseInt(entity.slice(1), 10), whole);
    }
    return NAMED_ENTITIES[entity] ?? whole;
  });
}

function fromCodePoint(code: number, fallback: string): string {
  return Number.isInteger(code) && code >= 0 && code <= 0x10ffff ? String.fromCodePoint(code) : fallback;
}

function parseAttributes(raw: string): Record<string, string> {
  const attributes: Record<string, string> = {};
  for (const match of raw.matchAll(ATTRIBUTE_PATTERN)) {
    attributes[match[1].toLowerCase()] = decodeEntities(match[2]);
  }
  return attributes;
}

/**
 * Split paragraph markup into styled runs. `<br/>` becomes a newline inside
 * the run text; tags outside the supported set are kept as literal text.
 */
export function parseMarkup(markup: string): MarkupRun[] {
  const runs: MarkupRun[] = [];
  const links: LinkFrame[] = [];
  let bold = 0;
  let italic = 0;
  let underline = 0;

  const push = (raw: string) => {
    if (!raw) return;
    const text = decodeEntities(raw);
    const link = links.length ? links[links.length - 1] : null;
    const run: MarkupRun = {
      text,
      bold: bold > 0,
      italic: italic > 0,
      underline: underline > 0,
      link: link?.href ?? null,
      color: link?.color ?? null,
    };

    const previous = runs[runs.length - 1];
    if (
      previous &&
      previous.bold === run.bold &&
      previous.italic === run.italic &&
      previous.underline === run.underline &&
      previous.link === run.link &&
      previous.color === run.color
    ) {
      previous.text += run.text;
      return;
    }
    runs.push(run);
  };

  let cursor = 0;
  for (const match of markup.matchAll(TAG_PATTERN)) {
    const index = match.index ?? 0;
    push(markup.slice(cursor, index));
    cursor = index + match[0].length;

    const closing = match[1] === '/';
    const tag = match[2].toLowerCase();
    const selfClosing = match[4] === '/';

    if (tag === 'br' && !closing) {
      push('\n');
    } else if (tag === 'b' && !selfClosing) {
      bold = Math.max(0, bold + (closing ? -1 : 1));
    } else if (tag === 'i' && !selfClosing) {
      italic = Math.max(0, italic + (closing ? -1 : 1));
    } else if (tag === 'u' && !selfClosing) {
      underline = Math.max(0, underline + (closing ? -1 : 1));
    } else if (tag === 'a' && !selfClosing) {
      if (closing) {
        links.pop();
      } else {
        const attributes = parseAttributes(match[3]);
        links.push({ href: attributes.href || null, color: attributes.color || null });
      }
    } else {
      // Not part of the dialect: show it as typed.
      push(match[0].replace(/&/g, '&amp;'));
    }
  }
  push(markup.slice(cursor));

  return runs;
}

export function toPlainText(runs: MarkupRun[]): string {
  return runs.map((run) => run.text).join('');
}
