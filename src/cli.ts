#!/usr/bin/env node
import path from 'node:path';
import { parseArgs } from 'node:util';

import { CvGenerationService } from './services/cv-generation';
import { isCvGeneratorError, toErrorMessage } from './utils/errors';

export const SUPPORTED_LANGUAGES = ['pt', 'en'] as const;

export const DEFAULT_CONFIG_FILE = path.resolve(__dirname, '..', 'config', 'config.json');

export const USAGE = `Usage: cv-pdf [input] [options]

Generate a PDF CV from a JSON data file.

Arguments:
  input                    CV data file (defaults to the file named in the config)

Options:
  -l, --language <lang>    Output language: ${SUPPORTED_LANGUAGES.join(', ')}
  -o, --output <file>      Output PDF path (defaults to the configured output directory)
  -c, --config <file>      Configuration file (default: config/config.json)
  -h, --help               Show this help
`;

export type CliArguments = {
  input: string | null;
  language: string | null;
  output: string | null;
  config: string;
  help: boolean;
};

class UsageError extends Error {}

function isSupportedLanguage(value: string): boolean {
  return SUPPORTED_LANGUAGES.some((language) => language === value);
}

export function parseCliArguments(argv: string[]): CliArguments {
  let parsed;
  try {
    parsed = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        language: { type: 'string', short: 'l' },
        output: { type: 'string', short: 'o' },
        config: { type: 'string', short: 'c', default: DEFAULT_CONFIG_FILE },
        help: { type: 'boolean', short: 'h', default: false },
      },
    });
  } catch (error) {
    throw new UsageError(toErrorMessage(error), { cause: error });
  }

  const { values, positionals } = parsed;
  if (positionals.length > 1) {
    throw new UsageError(`Unexpected arguments: ${positionals.slice(1).join(' ')}`);
  }

  const language = values.language?.trim().toLowerCase() || null;
  if (language && !isSupportedLanguage(language)) {
    throw new UsageError(`Unsupported language '${values.language}'. Choose one of: ${SUPPORTED_LANGUAGES.join(', ')}`);
  }

  return {
    input: positionals[0] ?? null,
    language,
    output: values.output ?? null,
    config: values.config ?? DEFAULT_CONFIG_FILE,
    help: values.help ?? false,
  };
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let args: CliArguments;
  try {
    args = parseCliArguments(argv);
  } catch (error) {
    process.stderr.write(`Error: ${toErrorMessage(error)}\n\n${USAGE}`);
    return 1;
  }

  if (args.help) {
    process.stdout.write(USAGE);
    return 0;
  }

  let service: CvGenerationService | null = null;
  try {
    service = await CvGenerationService.create(args.config);
    const outputPath = await service.generate({
      language: args.language,
      inputFile: args.input,
      outputFile: args.output,
    });
    process.stdout.write(`✓ CV generated successfully: ${outputPath}\n`);
    return 0;
  } catch (error) {
    if (isCvGeneratorError(error)) {
      service?.logger.error(`[cv] ${error.message}`, { event: 'app_failed', step: 'cli' });
      process.stderr.write(`Error: ${error.message}\n`);
    } else {
      service?.logger.error('[cv] Unexpected error while generating CV', {
        event: 'app_failed',
        step: 'cli',
        stack: error instanceof Error ? error.stack : String(error),
      });
      process.stderr.write('Error: Unexpected failure while generating the CV. See the log file for details.\n');
    }
    return 1;
  } finally {
    service?.logger.close();
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`Error: ${toErrorMessage(error)}\n`);
      process.exitCode = 1;
    },
  );
}
