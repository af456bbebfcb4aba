import { TimelineSectionFormatter } from './timeline-section-formatter';

export class ExperienceSectionFormatter extends TimelineSectionFormatter {
  protected readonly titleField = 'position';
  protected readonly subtitleField = 'company';
}
