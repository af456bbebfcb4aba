export { CvGenerationService, runGeneration, buildOutputFileName } from './services/cv-generation';
export type { GenerateOptions, RunGenerationOptions } from './services/cv-generation';
export { CvPdfRenderer, resolveSectionsToRender, formatPhoneNumber } from './services/cv-renderer';
export type { CvPdfRendererOptions } from './services/cv-renderer';

export {
  SectionFormatterRegistry,
  buildDefaultSectionFormatterRegistry,
  DEFAULT_SECTION_ORDER,
} from './sections/section-formatter-registry';
export type { SectionType } from './sections/section-formatter-registry';
export { BaseSectionFormatter } from './sections/base-section-formatter';
export type { SectionFormatter, SectionFormatterContext, SectionItem } from './sections/base-section-formatter';

export { PdfStyleEngine, validateStyleConfiguration } from './styles/style-engine';
export type { PageMargins, StyleConfiguration } from './styles/style-engine';
export { buildStylesheet } from './styles/stylesheet';
export type { ParagraphStyle, Stylesheet } from './styles/stylesheet';

export {
  resolveField,
  resolveList,
  resolveTranslation,
  formatMonth,
  formatPeriod,
  escapePreservingTags,
  escapeAttribute,
  processRichText,
  sanitizeFilenameComponent,
} from './utils/localization';
export type { Translations, PeriodInput } from './utils/localization';

export { loadAppConfig, parseAppConfig } from './utils/config';
export type { AppConfig } from './utils/config';
export { validateCvData } from './utils/cv-validation';
export { renderBlocksToPdf } from './utils/cv-pdf';
export type { DocumentBlock } from './utils/pdf-blocks';
export { createAppLogger } from './utils/logger';
export type { GenerationContext, RenderLogger } from './utils/logger';
export * from './utils/errors';
