import { z } from 'zod';
import { RecipeConfigError } from './errors';

export type EnvSource = Record<string, string | undefined>;

const FLAG_WORDS = new Map<string, boolean>([
  ['1', true],
  ['true', true],
  ['yes', true],
  ['on', true],
  ['0', false],
  ['false', false],
  ['no', false],
  ['off', false]
]);

/** Parses the value half of a `name=value` option assignment. */
export function flagValue(name: string) {
  return z.string().transform((raw, ctx) => {
    const word = raw.trim().toLowerCase();
    if (!word) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `missing value for ${name}` });
      return z.NEVER;
    }
    const flag = FLAG_WORDS.get(word);
    if (flag === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `expected one of ${[...FLAG_WORDS.keys()].join(', ')}, got '${raw.trim()}'`
      });
      return z.NEVER;
    }
    return flag;
  });
}

// Blank directory variables count as unset.
export const directoryVar = z
  .string()
  .optional()
  .transform((value) => value?.trim() || undefined);

export function loadEnvConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, env: EnvSource = process.env): T {
  const result = schema.safeParse({ ...env });
  if (result.success) {
    return result.data;
  }
  const details = result.error.issues.map((issue) => `${issue.path.join('.') || 'environment'}: ${issue.message}`);
  throw new RecipeConfigError(`Invalid CMAKE_UTIL_* configuration (${details.join('; ')})`);
}
