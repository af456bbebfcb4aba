export type ParagraphBlock = {
  kind: 'paragraph';
  style: string;
  markup: string;
};

/** Vertical gap, in millimetres. */
export type SpacerBlock = {
  kind: 'spacer';
  height: number;
};

export type DocumentBlock = ParagraphBlock | SpacerBlock;

export function paragraph(style: string, markup: string): ParagraphBlock {
  return { kind: 'paragraph', style, markup };
}

export function spacer(height: number): SpacerBlock {
  return { kind: 'spacer', height };
}
