import crypto from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';

import type { Logger } from 'winston';

import { loadAppConfig, type AppConfig } from '../utils/config';
import { validateCvData } from '../utils/cv-validation';
import { OutputPathError } from '../utils/errors';
import { isRecord, loadJsonDocument, type JsonObject } from '../utils/json';
import { resolveField, sanitizeFilenameComponent } from '../utils/localization';
import { createAppLogger, type GenerationContext } from '../utils/logger';
import { CvPdfRenderer } from './cv-renderer';

export type GenerateOptions = {
  language?: string | null;
  inputFile?: string | null;
  outputFile?: string | null;
};

function newRequestId(): string {
  return crypto.randomUUID().replace(/-/g, '').slice(0, 8);
}

export function isInsideDirectory(directory: string, candidate: string): boolean {
  const relative = path.relative(directory, candidate);
  return Boolean(relative) && !relative.startsWith('..') && !path.isAbsolute(relative);
}

/**
 * File name for a generated CV: `{name}_{role}.pdf` for Portuguese and
 * `{name}_{role}_{LANG}.pdf` otherwise.
 */
export function buildOutputFileName(cvData: JsonObject, language: string): string {
  const personalInfo: JsonObject = isRecord(cvData.personal_info) ? cvData.personal_info : {};
  const name = sanitizeFilenameComponent(personalInfo.name ?? 'CV', 'CV');
  const role = sanitizeFilenameComponent(resolveField(cvData.desired_role, 'desired_role', language, 'CV'), 'CV');
  const suffix = language === 'pt' ? '' : `_${language.toUpperCase()}`;
  return `${name}_${role}${suffix}.pdf`;
}

export class CvGenerationService {
  readonly configFilePath: string;
  readonly config: AppConfig;
  readonly logger: Logger;

  private constructor(configFilePath: string, config: AppConfig, logger: Logger) {
    this.configFilePath = configFilePath;
    this.config = config;
    this.logger = logger;
  }

  static async create(configFilePath: string, options: { logger?: Logger } = {}): Promise<CvGenerationService> {
    const resolvedConfigPath = path.resolve(configFilePath);
    const config = await loadAppConfig(resolvedConfigPath);
    const configDirectory = path.dirname(resolvedConfigPath);

    let logger = options.logger;
    if (!logger) {
      const directory = path.resolve(configDirectory, config.logging.directory);
      await fs.mkdir(directory, { recursive: true });
      logger = createAppLogger({ ...config.logging, directory });
    }

    return new CvGenerationService(resolvedConfigPath, config, logger);
  }

  private get configDirectory(): string {
    return path.dirname(this.configFilePath);
  }

  private resolveConfigRelative(rawPath: string): string {
    return path.resolve(this.configDirectory, rawPath);
  }

  resolveDataPath(language: string, inputFile?: string | null): string {
    if (inputFile) return path.resolve(inputFile);

    const { data, dataByLanguage } = this.config.files;
    if (data) return this.resolveConfigRelative(data);

    const mapped = dataByLanguage?.[language];
    if (mapped) return this.resolveConfigRelative(mapped);

    throw new OutputPathError(`No data file configured for language '${language}'`);
  }

  resolveTranslationsPath(language: string): string {
    const { translations, translationsByLanguage } = this.config.files;
    if (translations) return this.resolveConfigRelative(translations);

    const mapped = translationsByLanguage?.[language];
    if (mapped) return this.resolveConfigRelative(mapped);

    throw new OutputPathError(`No translations file configured for language '${language}'`);
  }

  async buildOutputFilePath(cvData: JsonObject, language: string): Promise<string> {
    const outputDirectory = this.resolveConfigRelative(this.config.files.outputDir);
    await fs.mkdir(outputDirectory, { recursive: true });

    const candidate = path.resolve(outputDirectory, buildOutputFileName(cvData, language));
    if (!isInsideDirectory(outputDirectory, candidate)) {
      throw new OutputPathError(`Generated output path escaped output directory: ${candidate}`);
    }
    return candidate;
  }

  async generate(options: GenerateOptions = {}): Promise<string> {
    const language = (options.language?.trim() || this.config.defaults.language).toLowerCase();
    const requestId = newRequestId();
    const startedAt = Date.now();
    const { encoding } = this.config.defaults;

    const dataPath = this.resolveDataPath(language, options.inputFile);
    const stylesPath = this.resolveConfigRelative(this.config.files.styles);
    const translationsPath = this.resolveTranslationsPath(language);

    const cvData = await loadJsonDocument(dataPath, encoding);
    const visualSettings = await loadJsonDocument(stylesPath, encoding);
    const translations = await loadJsonDocument(translationsPath, encoding);

    const logger = this.logger.child({ requestId, language });
    const context: GenerationContext = { requestId, language, logger };
    logger.info(`[cv] Starting CV generation from ${dataPath}`, { event: 'app_start', step: 'cv_service' });

    const renderer = new CvPdfRenderer({ language, translations, visualSettings });

    validateCvData(cvData);
    logger.info('[cv] Input data validated successfully', { event: 'input_validated', step: 'validators' });

    const outputPath = options.outputFile
      ? path.resolve(options.outputFile)
      : await this.buildOutputFilePath(cvData, language);

    const generated = await renderer.renderToFile(cvData, outputPath, context);

    logger.info(`[cv] CV generation finished: ${generated}`, {
      event: 'app_finished',
      step: 'cv_service',
      durationMs: Date.now() - startedAt,
    });
    return generated;
  }
}

export type RunGenerationOptions = GenerateOptions & {
  configFile: string;
  logger?: Logger;
};

export async function runGeneration(options: RunGenerationOptions): Promise<string> {
  const service = await CvGenerationService.create(options.configFile, { logger: options.logger });
  return service.generate(options);
}
