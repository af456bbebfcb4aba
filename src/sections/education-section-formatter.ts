import { TimelineSectionFormatter } from './timeline-section-formatter';

export class EducationSectionFormatter extends TimelineSectionFormatter {
  protected readonly titleField = 'degree';
  protected readonly subtitleField = 'institution';
}
