import type { Stylesheet } from '../styles/stylesheet';
import { formatPeriod } from '../utils/localization';
import type { DocumentBlock } from '../utils/pdf-blocks';
import { BaseSectionFormatter, type SectionItem } from './base-section-formatter';

export function buildPeriodText(item: SectionItem, translations: Record<string, unknown>, language: string): string {
  return formatPeriod(
    {
      startMonth: item.start_month ?? '',
      startYear: item.start_year ?? '',
      endMonth: item.end_month ?? '',
      endYear: item.end_year ?? '',
    },
    translations,
    language,
  );
}

/**
 * Title, subtitle, date range and bullets: the layout shared by experience
 * and education entries.
 */
export abstract class TimelineSectionFormatter extends BaseSectionFormatter {
  protected abstract readonly titleField: string;
  protected abstract readonly subtitleField: string;

  formatItem(blocks: DocumentBlock[], styles: Stylesheet, item: SectionItem): void {
    const title = this.localizedField(item, this.titleField);
    const subtitle = this.localizedField(item, this.subtitleField);
    const period = buildPeriodText(item, this.translations, this.language);

    this.addBoldParagraph(blocks, styles, title, 'ItemTitleStyle');
    this.addBoldParagraph(blocks, styles, subtitle, 'ItemSubtitleStyle');
    this.addItalicParagraph(blocks, styles, period, 'DateStyle');

    this.addBulletDescriptions(blocks, styles, this.localizedList(item, 'description'));
    this.addSpacing(blocks, 'small_bottom');
  }
}
