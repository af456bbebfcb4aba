import type { Stylesheet } from '../styles/stylesheet';
import type { DocumentBlock } from '../utils/pdf-blocks';
import { BaseSectionFormatter, type SectionItem } from './base-section-formatter';

export class LanguagesSectionFormatter extends BaseSectionFormatter {
  formatItem(blocks: DocumentBlock[], styles: Stylesheet, item: SectionItem): void {
    const language = this.localizedField(item, 'language');
    const proficiency = this.localizedField(item, 'proficiency');
    this.addCompositeParagraph(blocks, styles, language, proficiency);
  }
}
