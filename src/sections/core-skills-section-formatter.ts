import type { Stylesheet } from '../styles/stylesheet';
import type { DocumentBlock } from '../utils/pdf-blocks';
import { BaseSectionFormatter, type SectionItem } from './base-section-formatter';

export class CoreSkillsSectionFormatter extends BaseSectionFormatter {
  formatItem(blocks: DocumentBlock[], styles: Stylesheet, item: SectionItem): void {
    this.addCategoryTitle(blocks, styles, item);
    this.addBulletDescriptions(blocks, styles, this.localizedList(item, 'description'));
    this.addSpacing(blocks, 'minimal_bottom');
  }
}
