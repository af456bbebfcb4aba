import type { PdfStyleEngine, ParagraphStyleName, SpacingKey } from '../styles/style-engine';
import type { Stylesheet } from '../styles/stylesheet';
import { PdfRenderError } from '../utils/errors';
import { escapePreservingTags, processRichText, resolveField, resolveList, type Translations } from '../utils/localization';
import { paragraph, spacer, type DocumentBlock } from '../utils/pdf-blocks';

export type SectionItem = Record<string, unknown>;

export type SectionFormatterContext = {
  language: string;
  translations: Translations;
  styleEngine: PdfStyleEngine;
};

export const BULLET = '•';

export interface SectionFormatter {
  formatItem(blocks: DocumentBlock[], styles: Stylesheet, item: SectionItem): void;
}

/**
 * Shared building blocks for section formatters. Subclasses only decide which
 * fields go where.
 */
export abstract class BaseSectionFormatter implements SectionFormatter {
  protected readonly language: string;
  protected readonly translations: Translations;
  protected readonly styleEngine: PdfStyleEngine;

  constructor(context: SectionFormatterContext) {
    this.language = context.language;
    this.translations = context.translations;
    this.styleEngine = context.styleEngine;
  }

  abstract formatItem(blocks: DocumentBlock[], styles: Stylesheet, item: SectionItem): void;

  protected localizedField(item: SectionItem, fieldName: string, fallback = ''): string {
    return resolveField(item, fieldName, this.language, fallback);
  }

  protected localizedList(item: SectionItem, fieldName: string): string[] {
    return resolveList(item, fieldName, this.language);
  }

  protected styleName(styles: Stylesheet, name: ParagraphStyleName): ParagraphStyleName {
    if (!styles.has(name)) throw new PdfRenderError(`Stylesheet has no paragraph style '${name}'`);
    return name;
  }

  protected addBoldParagraph(blocks: DocumentBlock[], styles: Stylesheet, text: string, style: ParagraphStyleName) {
    if (!text) return;
    blocks.push(paragraph(this.styleName(styles, style), `<b>${escapePreservingTags(text)}</b>`));
  }

  protected addItalicParagraph(blocks: DocumentBlock[], styles: Stylesheet, text: string, style: ParagraphStyleName) {
    if (!text) return;
    blocks.push(paragraph(this.styleName(styles, style), `<i>${escapePreservingTags(text)}</i>`));
  }

  protected addPlainParagraph(blocks: DocumentBlock[], styles: Stylesheet, text: string, style: ParagraphStyleName) {
    if (!text) return;
    blocks.push(paragraph(this.styleName(styles, style), escapePreservingTags(text)));
  }

  /** `<b>main</b> - detail`, or whichever half is present on its own. */
  protected composeMainWithDetail(mainText: string, detailText: string, separator = ' - '): string {
    const main = escapePreservingTags(mainText);
    const detail = escapePreservingTags(detailText);
    if (main && detail) return `<b>${main}</b>${separator}${detail}`;
    return main || detail;
  }

  protected addCompositeParagraph(blocks: DocumentBlock[], styles: Stylesheet, mainText: string, detailText: string) {
    const markup = this.composeMainWithDetail(mainText, detailText);
    if (markup) blocks.push(paragraph(this.styleName(styles, 'BodyStyle'), markup));
  }

  protected addBulletDescriptions(blocks: DocumentBlock[], styles: Stylesheet, descriptions: string[]) {
    for (const description of descriptions) {
      blocks.push(paragraph(this.styleName(styles, 'BodyStyle'), `${BULLET} ${processRichText(description)}`));
    }
  }

  protected addCategoryTitle(blocks: DocumentBlock[], styles: Stylesheet, item: SectionItem) {
    this.addPlainParagraph(blocks, styles, this.localizedField(item, 'category'), 'ItemTitleStyle');
  }

  protected addCommaJoined(blocks: DocumentBlock[], styles: Stylesheet, values: unknown) {
    if (!Array.isArray(values) || !values.length) return;
    const text = values
      .filter((value) => value !== null && value !== undefined)
      .map((value) => String(value))
      .join(', ');
    this.addPlainParagraph(blocks, styles, text, 'BodyStyle');
  }

  protected addSpacing(blocks: DocumentBlock[], key: SpacingKey) {
    blocks.push(spacer(this.styleEngine.spacing(key)));
  }
}
