import fs from 'node:fs/promises';
import path from 'node:path';

import {
  buildDefaultSectionFormatterRegistry,
  DEFAULT_SECTION_ORDER,
  type SectionFormatterRegistry,
} from '../sections/section-formatter-registry';
import { PdfStyleEngine } from '../styles/style-engine';
import type { Stylesheet } from '../styles/stylesheet';
import { renderBlocksToPdf } from '../utils/cv-pdf';
import { PdfRenderError, toErrorMessage } from '../utils/errors';
import { isRecord, type JsonObject } from '../utils/json';
import {
  escapeAttribute,
  escapePreservingTags,
  processRichText,
  resolveField,
  resolveTranslation,
  type Translations,
} from '../utils/localization';
import type { GenerationContext } from '../utils/logger';
import { paragraph, spacer, type DocumentBlock } from '../utils/pdf-blocks';

const DEFAULT_SECTION_ORDER_VALUE = 999;
const BRAZIL_COUNTRY_CODE = '+55';

function toText(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'bigint') return String(value);
  return '';
}

function coerceOrder(value: unknown): number {
  const n = typeof value === 'number' ? value : typeof value === 'string' && value.trim() ? Number(value) : NaN;
  return Number.isFinite(n) ? n : DEFAULT_SECTION_ORDER_VALUE;
}

function isEmptySectionData(value: unknown): boolean {
  if (!value) return true;
  if (Array.isArray(value)) return value.length === 0;
  return isRecord(value) && Object.keys(value).length === 0;
}

function isEnabled(section: JsonObject): boolean {
  if (!('enabled' in section)) return true;
  const enabled = section.enabled;
  if (typeof enabled === 'string') return enabled !== '';
  if (typeof enabled === 'number') return enabled !== 0;
  return Boolean(enabled);
}

/**
 * Section types to render, in order. An explicit `sections` list is filtered
 * to enabled entries, sorted by `order` and de-duplicated by type; without one
 * the fixed default order applies.
 */
export function resolveSectionsToRender(cvData: JsonObject): string[] {
  const sections = cvData.sections;
  if (!Array.isArray(sections)) return [...DEFAULT_SECTION_ORDER];

  const enabled = sections.filter(isRecord).filter(isEnabled);
  const sorted = enabled
    .map((section, index) => ({ section, index, order: coerceOrder(section.order) }))
    .sort((a, b) => a.order - b.order || a.index - b.index);

  const types: string[] = [];
  for (const { section } of sorted) {
    const type = section.type;
    if (typeof type === 'string' && type && !types.includes(type)) types.push(type);
  }
  return types;
}

/** Applies the `+55` country code to phone numbers on English CVs. */
export function formatPhoneNumber(phone: string, language: string): string {
  if (!phone) return phone;
  if (language === 'en' && !phone.startsWith(BRAZIL_COUNTRY_CODE)) return `${BRAZIL_COUNTRY_CODE} ${phone}`;
  return phone;
}

export type CvPdfRendererOptions = {
  language: string;
  translations: Translations;
  visualSettings: unknown;
};

export class CvPdfRenderer {
  readonly language: string;
  readonly translations: Translations;
  readonly styleEngine: PdfStyleEngine;
  readonly registry: SectionFormatterRegistry;

  constructor(options: CvPdfRendererOptions) {
    this.language = options.language;
    this.translations = options.translations;
    this.styleEngine = new PdfStyleEngine(options.visualSettings);
    this.registry = buildDefaultSectionFormatterRegistry({
      language: this.language,
      translations: this.translations,
      styleEngine: this.styleEngine,
    });
  }

  buildBlocks(
    cvData: JsonObject,
    context: GenerationContext,
    styles: Stylesheet = this.styleEngine.buildStylesheet(),
  ): DocumentBlock[] {
    const blocks: DocumentBlock[] = [];

    this.addHeader(blocks, cvData);
    this.addSummary(blocks, cvData);
    this.addSections(blocks, styles, cvData, context);

    return blocks;
  }

  async renderToFile(cvData: JsonObject, outputPath: string, context: GenerationContext): Promise<string> {
    const log = context.logger;
    log.info('[pdf] Building PDF document', { event: 'pdf_build_started', step: 'pdf_renderer' });

    const stylesheet = this.styleEngine.buildStylesheet();
    const blocks = this.buildBlocks(cvData, context, stylesheet);

    try {
      const pdf = await renderBlocksToPdf({
        blocks,
        stylesheet,
        margins: this.styleEngine.margins(),
        title: this.documentTitle(cvData),
      });
      await fs.mkdir(path.dirname(outputPath), { recursive: true });
      await fs.writeFile(outputPath, pdf);
    } catch (error) {
      throw new PdfRenderError(`Failed to build PDF: ${outputPath} (${toErrorMessage(error)})`, {
        cause: error,
        outputPath,
      });
    }

    log.info('[pdf] PDF document built successfully', { event: 'pdf_build_finished', step: 'pdf_renderer' });
    return outputPath;
  }

  addHeader(blocks: DocumentBlock[], cvData: JsonObject): void {
    const personalInfo: JsonObject = isRecord(cvData.personal_info) ? cvData.personal_info : {};

    const name = toText(personalInfo.name);
    if (name) blocks.push(paragraph('NameStyle', escapePreservingTags(name)));

    const desiredRole = resolveField(cvData.desired_role, 'desired_role', this.language);
    if (desiredRole) blocks.push(paragraph('TitleStyle', escapePreservingTags(desiredRole)));

    const contactItems = [
      formatPhoneNumber(toText(personalInfo.phone), this.language),
      toText(personalInfo.email),
      toText(personalInfo.location),
    ].filter(Boolean);
    if (contactItems.length) {
      blocks.push(paragraph('ContactStyle', escapePreservingTags(contactItems.join(' | '))));
    }

    const socialLinks = this.buildSocialLinks(personalInfo.social);
    if (socialLinks.length) blocks.push(paragraph('ContactStyle', socialLinks.join(' | ')));

    blocks.push(spacer(this.styleEngine.spacing('header_bottom')));
  }

  addSummary(blocks: DocumentBlock[], cvData: JsonObject): void {
    const summary = resolveField(cvData.summary, 'description', this.language);
    if (!summary) return;

    const title = resolveTranslation(this.translations, this.language, 'sections', 'summary', 'Summary');
    blocks.push(paragraph('SectionTitleStyle', escapePreservingTags(title)));
    blocks.push(paragraph('BodyStyle', processRichText(summary)));
    blocks.push(spacer(this.styleEngine.spacing('section_bottom')));
  }

  addSectionTitle(blocks: DocumentBlock[], sectionType: string): void {
    const title = resolveTranslation(this.translations, this.language, 'sections', sectionType, sectionType);
    blocks.push(paragraph('SectionTitleStyle', escapePreservingTags(title)));
  }

  addSections(blocks: DocumentBlock[], styles: Stylesheet, cvData: JsonObject, context: GenerationContext): void {
    const log = context.logger;

    for (const sectionType of resolveSectionsToRender(cvData)) {
      const items = cvData[sectionType];
      if (isEmptySectionData(items)) continue;

      if (!Array.isArray(items)) {
        log.warn(`[sections] Section data is not a list; skipping section "${sectionType}"`, {
          event: 'section_render_skipped',
          step: sectionType,
        });
        continue;
      }

      const formatter = this.registry.getFormatter(sectionType);
      if (!formatter) {
        log.warn(`[sections] Unknown section type; skipping section "${sectionType}"`, {
          event: 'section_render_skipped',
          step: sectionType,
        });
        continue;
      }

      const startedAt = Date.now();
      log.info(`[sections] Rendering section "${sectionType}"`, { event: 'section_render_started', step: sectionType });

      this.addSectionTitle(blocks, sectionType);
      items.forEach((item: unknown, index) => {
        if (!isRecord(item)) {
          log.warn(`[sections] Item ${index} of "${sectionType}" is not an object; skipping item`, {
            event: 'section_item_skipped',
            step: sectionType,
          });
          return;
        }
        formatter.formatItem(blocks, styles, item);
      });
      blocks.push(spacer(this.styleEngine.spacing('item_bottom')));

      log.info(`[sections] Finished rendering section "${sectionType}"`, {
        event: 'section_render_finished',
        step: sectionType,
        durationMs: Date.now() - startedAt,
      });
    }
  }

  private buildSocialLinks(social: unknown): string[] {
    if (!Array.isArray(social)) return [];

    const color = escapeAttribute(this.styleEngine.socialLinkColor());
    const links: string[] = [];
    for (const entry of social) {
      if (!isRecord(entry)) continue;
      const url = toText(entry.url);
      if (!url) continue;
      const label = toText(entry.label) || url;
      links.push(`<a href="${escapeAttribute(url)}" color="${color}">${escapePreservingTags(label)}</a>`);
    }
    return links;
  }

  private documentTitle(cvData: JsonObject): string {
    const personalInfo: JsonObject = isRecord(cvData.personal_info) ? cvData.personal_info : {};
    const parts = [toText(personalInfo.name), resolveField(cvData.desired_role, 'desired_role', this.language)];
    return parts.filter(Boolean).join(' - ');
  }
}
