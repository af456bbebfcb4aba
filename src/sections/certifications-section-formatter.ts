import type { Stylesheet } from '../styles/stylesheet';
import type { DocumentBlock } from '../utils/pdf-blocks';
import { BaseSectionFormatter, type SectionItem } from './base-section-formatter';

function toTrimmedText(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'bigint') return String(value);
  return '';
}

export class CertificationsSectionFormatter extends BaseSectionFormatter {
  formatItem(blocks: DocumentBlock[], styles: Stylesheet, item: SectionItem): void {
    const name = this.localizedField(item, 'name');
    const issuer = this.localizedField(item, 'issuer');
    const year = toTrimmedText(item.year);

    const detail = name && issuer && year ? `${issuer} (${year})` : issuer;
    this.addCompositeParagraph(blocks, styles, name, detail);
  }
}
