import type { Stylesheet } from '../styles/stylesheet';
import type { DocumentBlock } from '../utils/pdf-blocks';
import { BaseSectionFormatter, type SectionItem } from './base-section-formatter';

/** Skill groups: a localized category followed by its (unlocalized) `item` list. */
export class SkillsSectionFormatter extends BaseSectionFormatter {
  formatItem(blocks: DocumentBlock[], styles: Stylesheet, item: SectionItem): void {
    this.addCategoryTitle(blocks, styles, item);
    this.addCommaJoined(blocks, styles, item.item);
    this.addSpacing(blocks, 'item_bottom');
  }
}
