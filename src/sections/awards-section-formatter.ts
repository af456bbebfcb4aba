import type { Stylesheet } from '../styles/stylesheet';
import type { DocumentBlock } from '../utils/pdf-blocks';
import { BaseSectionFormatter, type SectionItem } from './base-section-formatter';

export class AwardsSectionFormatter extends BaseSectionFormatter {
  formatItem(blocks: DocumentBlock[], styles: Stylesheet, item: SectionItem): void {
    const title = this.localizedField(item, 'title');
    const description = this.localizedField(item, 'description');
    this.addCompositeParagraph(blocks, styles, title, description);
  }
}
