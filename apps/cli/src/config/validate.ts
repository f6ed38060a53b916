import { z } from 'zod';
import { ConfigValidationError } from '../errors';

// ---------------------------------------------------------------------------
// Zod schema
// ---------------------------------------------------------------------------

const timeoutSchema = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((val) => Number(val))
    .pipe(z.number().int().min(1).max(600_000));

const flagSchema = z
  .string()
  .optional()
  .transform((raw) => {
    if (!raw) return false;
    const normalized = raw.trim().toLowerCase();
    return normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on';
  });

const envSchema = z.object({
  SNMPTRANSLATE_BIN: z.string().trim().min(1, 'SNMPTRANSLATE_BIN must not be empty').default('snmptranslate'),
  MIB_LOAD_TIMEOUT_MS: timeoutSchema('15000'),
  MIB_ENUM_TIMEOUT_MS: timeoutSchema('30000'),
  MIB_SYMBOL_TIMEOUT_MS: timeoutSchema('10000'),
  MIB2TEMPLATE_VERBOSE: flagSchema
});

export type EnvConfig = z.infer<typeof envSchema>;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Validates the environment the translator runs with.
 *
 * Throws a `ConfigValidationError` listing every problem when a value is invalid.
 */
export function loadEnvConfig(env: Record<string, string | undefined> = process.env): EnvConfig {
  const result = envSchema.safeParse({
    SNMPTRANSLATE_BIN: env.SNMPTRANSLATE_BIN,
    MIB_LOAD_TIMEOUT_MS: env.MIB_LOAD_TIMEOUT_MS,
    MIB_ENUM_TIMEOUT_MS: env.MIB_ENUM_TIMEOUT_MS,
    MIB_SYMBOL_TIMEOUT_MS: env.MIB_SYMBOL_TIMEOUT_MS,
    MIB2TEMPLATE_VERBOSE: env.MIB2TEMPLATE_VERBOSE
  });

  if (!result.success) {
    const lines = result.error.issues.map(
      (issue) => `  - ${issue.path.join('.')}: ${issue.message}`
    );

    throw new ConfigValidationError([
      `Found ${lines.length} configuration error(s):`,
      ...lines
    ].join('\n'));
  }

  return result.data;
}
