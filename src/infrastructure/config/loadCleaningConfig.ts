import { readFile } from 'node:fs/promises';
import type { ZodIssue } from 'zod';
import type { CleaningConfig } from '../../domain/model/CleaningConfig.js';
import { createFieldSpec } from '../../domain/model/FieldSpec.js';
import { ConfigError } from '../../domain/errors/CleaningErrors.js';
import { DateTemplate } from '../../domain/services/DateTemplate.js';
import { FormatRegistry } from '../../domain/services/FormatRegistry.js';
import { cleaningConfigSchema } from './configSchema.js';
import type { CleaningConfigDocument } from './configSchema.js';

/** Looked up relative to the working directory when no path is given. */
export const DEFAULT_CONFIG_PATH = 'config/date-formats.json';

/** Render a zod issue path as `parseFormats[2].recognitionPattern`. */
export function formatIssuePath(path: readonly (string | number)[]): string {
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === 'number') return `${acc}[${String(segment)}]`;
    return acc ? `${acc}.${segment}` : segment;
  }, '');
}

function toConfigError(issues: readonly ZodIssue[], cause: unknown): ConfigError {
  const [first] = issues;
  if (!first) return new ConfigError('Invalid configuration', '', { cause });
  const more = issues.length > 1 ? ` (and ${String(issues.length - 1)} more issue(s))` : '';
  return new ConfigError(`${first.message}${more}`, formatIssuePath(first.path), { cause });
}

/**
 * Validate a parsed configuration document and build the frozen runtime
 * configuration. Throws `ConfigError` on the first problem found.
 */
export function parseCleaningConfig(document: unknown): CleaningConfig {
  const parsed = cleaningConfigSchema.safeParse(document);
  if (!parsed.success) {
    throw toConfigError(parsed.error.issues, parsed.error);
  }

  const data: CleaningConfigDocument = parsed.data;
  const registry = FormatRegistry.fromConfig(data.parseFormats, { onDecodeFailure: data.options.onDecodeFailure });

  return Object.freeze({
    enabled: data.enabled,
    outputFormat: DateTemplate.compile(data.outputFormat),
    outputFormatDateOnly: DateTemplate.compile(data.outputFormatDateOnly),
    dateFields: Object.freeze(data.dateFields.map((field) => createFieldSpec(field.name, field.aliases, field.hasTime))),
    registry,
    options: Object.freeze({
      onParseFailure: data.options.onParseFailure,
      stripTrailingDecimalZero: data.options.removeDecimalZero,
      logDetails: data.options.logDetails,
      outputMode: data.options.outputMode,
      onDecodeFailure: data.options.onDecodeFailure,
    }),
  });
}

/** Read and validate a JSON configuration file. */
export async function loadCleaningConfig(path: string = DEFAULT_CONFIG_PATH): Promise<CleaningConfig> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read configuration file '${path}'`, '', { cause: error });
  }

  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Configuration file '${path}' is not valid JSON`, '', { cause: error });
  }

  return parseCleaningConfig(document);
}
