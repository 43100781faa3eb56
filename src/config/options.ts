import { z } from 'zod';
import { ConfigurationError } from '../validation/errors.js';
import type { CustomValue, CustomValueOrder, GenerationMode } from '../types.js';
import type { Logger } from '../logger.js';

/**
 * Engine limits and defaults. Every field can also come from the environment
 * (see {@link settingsFromEnv}); explicit options win over the environment.
 */
export interface GeneratorSettings {
  /** Depth below the root at which subtrees are replaced by a marker. */
  maxDepth: number;
  /** Copies generated for an included multi-occurrence particle. */
  defaultRepeatCount: number;
  /** Upper clamp for repeat counts, including user overrides. */
  maxRepeatCount: number;
  /** Synthesis attempts before a pattern falls back to the placeholder. */
  patternMaxAttempts: number;
  seed: number;
  booleanDefault: boolean;
  /** Emit occurrence notes and guard markers as XML comments. */
  includeComments: boolean;
}

export const DEFAULT_SETTINGS: Readonly<GeneratorSettings> = Object.freeze({
  maxDepth: 8,
  defaultRepeatCount: 2,
  maxRepeatCount: 10,
  patternMaxAttempts: 5,
  seed: 424242,
  booleanDefault: true,
  includeComments: false,
});

/**
 * Options for `generateSampleXml` and {@link GenerationSession}.
 *
 * Path-keyed maps accept either a `Map` or a plain object. Keys are matched
 * exactly, then case-insensitively, then as a dot-boundary suffix, so
 * `Item.Price` and `Price` both address `Order.Item.Price`.
 */
export interface GenerationOptions {
  /**
   * Global element to use as the document root.
   * Defaults to the first global element of the schema.
   */
  rootElement?: string;
  /** @default 'minimal' */
  mode?: GenerationMode;
  /** Choice path → name of the alternative to materialize. */
  choiceSelections?: Map<string, string> | Record<string, string>;
  /** Element path → repeat count. */
  repetitionOverrides?: Map<string, number> | Record<string, number>;
  /** Paths of optional elements and attributes to include in `custom` mode. */
  optionalSelections?: Iterable<string>;
  /** Element or attribute path → literal value (a list cycles per occurrence). */
  customValues?: Map<string, CustomValue> | Record<string, CustomValue>;
  /** Element or attribute path → how its custom value list is consumed. @default 'sequential' */
  customValueOrder?: Map<string, CustomValueOrder> | Record<string, CustomValueOrder>;
  settings?: Partial<GeneratorSettings>;
  /**
   * Whether to pretty-print the output XML.
   * @default true
   */
  prettyPrint?: boolean;
  /**
   * Whether to include an XML declaration.
   * @default true
   */
  xmlDeclaration?: boolean;
  /**
   * Encoding declared in the XML declaration.
   * @default 'UTF-8'
   */
  encoding?: string;
  /** Base directory to resolve a relative XSD path. Defaults to `process.cwd()`. */
  xsdBaseDir?: string;
  logger?: Logger;
}

const ENV_KEYS = {
  maxDepth: 'XML_MAX_TREE_DEPTH',
  defaultRepeatCount: 'XML_DEFAULT_ELEMENT_COUNT',
  maxRepeatCount: 'XML_MAX_UNBOUNDED_COUNT',
  seed: 'XML_GENERATION_SEED',
} as const;

const countFromEnv = z.coerce.number().int().nonnegative();

const EnvSchema = z.object({
  [ENV_KEYS.maxDepth]: countFromEnv.optional(),
  [ENV_KEYS.defaultRepeatCount]: countFromEnv.optional(),
  [ENV_KEYS.maxRepeatCount]: countFromEnv.optional(),
  [ENV_KEYS.seed]: z.coerce.number().int().optional(),
});

export const SettingsSchema = z
  .object({
    maxDepth: z.number().int().nonnegative(),
    defaultRepeatCount: z.number().int().nonnegative(),
    maxRepeatCount: z.number().int().nonnegative(),
    patternMaxAttempts: z.number().int().nonnegative(),
    seed: z.number().int(),
    booleanDefault: z.boolean(),
    includeComments: z.boolean(),
  })
  .partial()
  .strict();

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Reads setting overrides from environment variables.
 *
 * @throws `ConfigurationError` when a variable is set to something that is
 * not a whole number.
 */
export function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<GeneratorSettings> {
  const parsed = EnvSchema.safeParse({
    [ENV_KEYS.maxDepth]: blankToUndefined(env[ENV_KEYS.maxDepth]),
    [ENV_KEYS.defaultRepeatCount]: blankToUndefined(env[ENV_KEYS.defaultRepeatCount]),
    [ENV_KEYS.maxRepeatCount]: blankToUndefined(env[ENV_KEYS.maxRepeatCount]),
    [ENV_KEYS.seed]: blankToUndefined(env[ENV_KEYS.seed]),
  });
  if (!parsed.success) {
    throw new ConfigurationError(
      'environment',
      parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    );
  }
  const {
    XML_MAX_TREE_DEPTH: maxDepth,
    XML_DEFAULT_ELEMENT_COUNT: defaultRepeatCount,
    XML_MAX_UNBOUNDED_COUNT: maxRepeatCount,
    XML_GENERATION_SEED: seed,
  } = parsed.data;
  const out: Partial<GeneratorSettings> = {};
  if (maxDepth !== undefined) out.maxDepth = maxDepth;
  if (defaultRepeatCount !== undefined) out.defaultRepeatCount = defaultRepeatCount;
  if (maxRepeatCount !== undefined) out.maxRepeatCount = maxRepeatCount;
  if (seed !== undefined) out.seed = seed;
  return out;
}

/**
 * Merges defaults, environment and explicit overrides (in that order).
 *
 * @throws `ConfigurationError` for invalid explicit values.
 */
export function resolveSettings(
  overrides: Partial<GeneratorSettings> = {},
  env: NodeJS.ProcessEnv = process.env,
): GeneratorSettings {
  const checked = SettingsSchema.safeParse(overrides);
  if (!checked.success) {
    throw new ConfigurationError(
      'settings',
      checked.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    );
  }
  const base: GeneratorSettings = { ...DEFAULT_SETTINGS, ...settingsFromEnv(env) };
  const o = checked.data;
  return {
    maxDepth: o.maxDepth ?? base.maxDepth,
    defaultRepeatCount: o.defaultRepeatCount ?? base.defaultRepeatCount,
    maxRepeatCount: o.maxRepeatCount ?? base.maxRepeatCount,
    patternMaxAttempts: o.patternMaxAttempts ?? base.patternMaxAttempts,
    seed: o.seed ?? base.seed,
    booleanDefault: o.booleanDefault ?? base.booleanDefault,
    includeComments: o.includeComments ?? base.includeComments,
  };
}
