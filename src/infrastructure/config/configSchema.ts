import { z } from 'zod';
import { DateTemplate } from '../../domain/services/DateTemplate.js';
import { fullMatchPattern } from '../../domain/model/FormatRule.js';
import { CleaningPolicy, DecodeFailureMode, OutputMode } from '../../domain/model/CleaningPolicy.js';

const templateSchema = z.string().superRefine((source, ctx) => {
  try {
    DateTemplate.compile(source);
  } catch (error) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: error instanceof Error ? error.message : String(error) });
  }
});

const regexSchema = z
  .string()
  .min(1, 'Recognition pattern must not be empty')
  .superRefine((source, ctx) => {
    try {
      fullMatchPattern(source);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid regular expression: ${error instanceof Error ? error.message : String(error)}`,
      });
    }
  });

export const dateFieldSchema = z
  .object({
    name: z.string().trim().min(1, 'Field name is required'),
    aliases: z.array(z.string()).default([]),
    hasTime: z.boolean().default(true),
  })
  .strict();

export const formatRuleSchema = z
  .object({
    name: z.string().trim().min(1, 'Rule name is required'),
    templatePattern: templateSchema.nullable().default(null),
    recognitionPattern: regexSchema,
    isSerialNumeric: z.boolean().default(false),
    description: z.string().default(''),
  })
  .strict()
  .superRefine((rule, ctx) => {
    if (!rule.isSerialNumeric && rule.templatePattern === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['templatePattern'],
        message: 'templatePattern is required unless isSerialNumeric is true',
      });
    }
  });

export const cleaningOptionsSchema = z
  .object({
    onParseFailure: z.nativeEnum(CleaningPolicy).default(CleaningPolicy.KEEP_ORIGINAL),
    removeDecimalZero: z.boolean().default(true),
    logDetails: z.boolean().default(false),
    outputMode: z.nativeEnum(OutputMode).default(OutputMode.REPLACE),
    onDecodeFailure: z.nativeEnum(DecodeFailureMode).default(DecodeFailureMode.FALLTHROUGH),
  })
  .strict();

export const cleaningConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    outputFormat: templateSchema.default('%Y-%m-%d %H:%M:%S'),
    outputFormatDateOnly: templateSchema.default('%Y-%m-%d'),
    dateFields: z.array(dateFieldSchema).default([]),
    parseFormats: z.array(formatRuleSchema).min(1, 'At least one parse format is required'),
    options: cleaningOptionsSchema.default({}),
  })
  .strict()
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.parseFormats.forEach((rule, index) => {
      if (seen.has(rule.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['parseFormats', index, 'name'],
          message: `Duplicate rule name '${rule.name}'`,
        });
      }
      seen.add(rule.name);
    });
  });

/** The configuration document as written on disk, before defaults are applied. */
export type CleaningConfigInput = z.input<typeof cleaningConfigSchema>;

/** The configuration document after validation and defaults. */
export type CleaningConfigDocument = z.output<typeof cleaningConfigSchema>;
