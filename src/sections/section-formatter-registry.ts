import { AwardsSectionFormatter } from './awards-section-formatter';
import type { SectionFormatter, SectionFormatterContext } from './base-section-formatter';
import { CertificationsSectionFormatter } from './certifications-section-formatter';
import { CoreSkillsSectionFormatter } from './core-skills-section-formatter';
import { EducationSectionFormatter } from './education-section-formatter';
import { ExperienceSectionFormatter } from './experience-section-formatter';
import { LanguagesSectionFormatter } from './languages-section-formatter';
import { SkillsSectionFormatter } from './skills-section-formatter';

export const DEFAULT_SECTION_ORDER = [
  'experience',
  'education',
  'core_skills',
  'skills',
  'languages',
  'awards',
  'certifications',
] as const;

export type SectionType = (typeof DEFAULT_SECTION_ORDER)[number];

export class SectionFormatterRegistry {
  private readonly formatters: Map<string, SectionFormatter>;

  constructor(formatters: Iterable<readonly [string, SectionFormatter]>) {
    this.formatters = new Map(formatters);
  }

  /** Null for section types nobody registered; callers skip those. */
  getFormatter(sectionType: string): SectionFormatter | null {
    return this.formatters.get(sectionType) ?? null;
  }

  sectionTypes(): string[] {
    return [...this.formatters.keys()];
  }
}

export function buildDefaultSectionFormatterRegistry(context: SectionFormatterContext): SectionFormatterRegistry {
  const formatters: Record<SectionType, SectionFormatter> = {
    experience: new ExperienceSectionFormatter(context),
    education: new EducationSectionFormatter(context),
    core_skills: new CoreSkillsSectionFormatter(context),
    skills: new SkillsSectionFormatter(context),
    languages: new LanguagesSectionFormatter(context),
    awards: new AwardsSectionFormatter(context),
    certifications: new CertificationsSectionFormatter(context),
  };
  return new SectionFormatterRegistry(Object.entries(formatters));
}
