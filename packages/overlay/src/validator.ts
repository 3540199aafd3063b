import { z } from 'zod';
import type { ClipConfig, TextKey } from '@wordclip/types';
import { InvalidParameterError, type ParameterIssue } from './errors';

// --- Field schemas ---

const positiveInteger = z
  .number({ invalid_type_error: 'must be a positive integer' })
  .int('must be a positive integer')
  .positive('must be a positive integer');

const finiteNumber = z
  .number({ invalid_type_error: 'must be a number' })
  .finite('must be a finite number');

const nonEmptyString = z
  .string({ invalid_type_error: 'must be a string' })
  .min(1, 'must not be empty');

const alignment = z.enum(['left', 'center', 'right'], {
  errorMap: () => ({ message: "must be 'left', 'center' or 'right'" }),
});

const nonNegative = finiteNumber.min(0, 'must not be negative');

// Colour name or #RRGGBB[AA] / 0xRRGGBB[AA], optionally @alpha. Interpolated into
// the ffmpeg filter graph unescaped.
const COLOR_PATTERN =
  /^(?:(?:#|0x)?[0-9A-Fa-f]{6}(?:[0-9A-Fa-f]{2})?|[A-Za-z]+)(?:@(?:0|1|0?\.\d+|1\.0+))?$/;

export const ColorSchema = z
  .string({ invalid_type_error: 'must be a string' })
  .regex(COLOR_PATTERN, 'must be a color name or hex code');

export const SizeSchema = z.tuple([positiveInteger, positiveInteger], {
  errorMap: () => ({ message: 'must be a [width, height] pair of positive integers' }),
});

export const MarginSchema = z.union(
  [
    nonNegative,
    z.tuple([nonNegative, nonNegative]),
    z.tuple([nonNegative, nonNegative, nonNegative, nonNegative]),
  ],
  {
    errorMap: () => ({
      message: 'must be a number, [horizontal, vertical] or [left, top, right, bottom]',
    }),
  },
);

export const RawEffectSchema = z.union([
  z.string(),
  z.object({
    name: z.string(),
    value: finiteNumber.nullable().optional(),
  }),
]);

export type RawEffect = z.infer<typeof RawEffectSchema>;

const ClipConfigSchema = z.object({
  text: z.string({ invalid_type_error: 'must be a string' }).optional(),
  word: z.string({ invalid_type_error: 'must be a string' }).optional(),
  font: nonEmptyString.optional(),
  color: ColorSchema.optional(),
  stroke_width: nonNegative.optional(),
  stroke_color: ColorSchema.optional(),
  size: SizeSchema.optional(),
  method: z
    .enum(['label', 'caption'], {
      errorMap: () => ({ message: "must be 'label' or 'caption'" }),
    })
    .optional(),
  align: alignment.optional(),
  text_align: alignment.optional(),
  horizontal_align: alignment.optional(),
  vertical_align: z
    .enum(['top', 'center', 'bottom'], {
      errorMap: () => ({ message: "must be 'top', 'center' or 'bottom'" }),
    })
    .optional(),
  interline: finiteNumber.optional(),
  bg_color: ColorSchema.optional(),
  margin: MarginSchema.optional(),
  font_size: positiveInteger.optional(),
  fontsize: positiveInteger.optional(),
  start_time: nonNegative.optional(),
  end_time: finiteNumber.optional(),
  duration: finiteNumber.positive('must be positive').optional(),
  effects: z.array(RawEffectSchema, { invalid_type_error: 'must be an array' }).optional(),
});

export type ParsedClipFields = z.infer<typeof ClipConfigSchema>;

export type ParsedClipConfig = {
  text: string;
  fields: ParsedClipFields;
};

// Cross-field rules depend on the call site's text key.
function refineFor(textKey: TextKey) {
  const otherKey: TextKey = textKey === 'text' ? 'word' : 'text';

  return ClipConfigSchema.superRefine((data, ctx) => {
    const value = data[textKey];
    if (value === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [textKey], message: 'is required' });
    } else if (value.trim().length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [textKey],
        message: 'must be a non-empty string',
      });
    }

    if (data[otherKey] !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [otherKey],
        message: `cannot be combined with '${textKey}'`,
      });
    }

    const start = data.start_time ?? 0;
    if (data.end_time !== undefined && data.end_time <= start) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['end_time'],
        message: `must be greater than start_time (${start})`,
      });
    }
  });
}

const CONFIG_SCHEMAS = {
  text: refineFor('text'),
  word: refineFor('word'),
} as const;

export function toParameterIssues(error: z.ZodError): ParameterIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : 'config',
    message: issue.message,
  }));
}

export function invalidParameter(issues: ParameterIssue[]): InvalidParameterError {
  const [first] = issues;
  if (!first) {
    return new InvalidParameterError('config', 'Invalid config');
  }
  return new InvalidParameterError(
    first.field,
    `Invalid '${first.field}': ${first.message}`,
    issues,
  );
}

/**
 * Checks a raw config map and returns its typed fields. Throws
 * `InvalidParameterError` listing every malformed field, or failing that,
 * every cross-field violation.
 */
export function parseClipConfig(config: unknown, textKey: TextKey): ParsedClipConfig {
  if (typeof config !== 'object' || config === null || Array.isArray(config)) {
    throw new InvalidParameterError('config', 'Config must be an object');
  }

  const result = CONFIG_SCHEMAS[textKey].safeParse(config);
  if (!result.success) {
    throw invalidParameter(toParameterIssues(result.error));
  }

  const text = result.data[textKey];
  if (text === undefined) {
    throw new InvalidParameterError(textKey, `Invalid '${textKey}': is required`);
  }

  return { text, fields: result.data };
}

export function validateClipConfig(config: ClipConfig, textKey: TextKey = 'text'): void {
  parseClipConfig(config, textKey);
}
