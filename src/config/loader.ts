import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { consoleLogger, type Logger } from '../logger.js';
import type { CustomScalar, CustomValueOrder, GenerationMode } from '../types.js';
import { ConfigurationError, type ValidationIssue } from '../validation/errors.js';
import type { GenerationOptions, GeneratorSettings } from './options.js';

const MODES: Record<'Minimalistic' | 'Complete' | 'Custom', GenerationMode> = {
  Minimalistic: 'minimal',
  Complete: 'complete',
  Custom: 'custom',
};

const MetadataSchema = z.object({
  name: z.string(),
  schema_name: z.string(),
  description: z.string().optional(),
  created: z.string().optional(),
  version: z.string().optional(),
});

const GenerationSettingsSchema = z
  .object({
    mode: z.enum(['Minimalistic', 'Complete', 'Custom']).default('Minimalistic'),
    root_element: z.string().min(1).optional(),
    global_repeat_count: z.number().int().min(1).max(50).optional(),
    max_depth: z.number().int().min(1).max(50).optional(),
    include_comments: z.boolean().optional(),
    deterministic_seed: z.number().int().optional(),
    ensure_unique_combinations: z.boolean().optional(),
  })
  .strict();

const SELECTION_ORDER: Record<'random' | 'sequential' | 'seeded' | 'template', CustomValueOrder> = {
  random: 'random',
  seeded: 'random',
  sequential: 'sequential',
  template: 'sequential',
};

const ElementConfigSchema = z
  .object({
    // choice context (`root` or a child element name) → alternative name
    choices: z.record(z.string()).optional(),
    repeat_count: z.number().int().min(0).max(50).optional(),
    include_optional: z.array(z.string()).optional(),
    custom_values: z.array(z.union([z.string(), z.number(), z.boolean()])).optional(),
    selection_strategy: z.enum(['random', 'sequential', 'seeded', 'template']).optional(),
    data_context: z.string().optional(),
    template_source: z.string().optional(),
    relationship: z.string().optional(),
    constraints: z.array(z.string()).optional(),
    ensure_unique: z.boolean().optional(),
  })
  .strict();

/** Element keys that are accepted for compatibility but change nothing. */
const INERT_ELEMENT_KEYS = ['data_context', 'template_source', 'relationship', 'constraints', 'ensure_unique'] as const;

const GlobalOverridesSchema = z
  .object({
    default_string_length: z.number().int().min(1).max(1000).optional(),
    use_realistic_data: z.boolean().optional(),
    preserve_structure: z.boolean().optional(),
    namespace_prefixes: z.record(z.string()).optional(),
  })
  .strict();

const RelationshipSchema = z
  .object({
    fields: z.array(z.string()).optional(),
    strategy: z.enum(['consistent_persona', 'dependent_values', 'constraint_based']).optional(),
    ensure_unique: z.boolean().optional(),
    constraints: z.array(z.string()).optional(),
    depends_on: z.array(z.string()).optional(),
  })
  .strict();

export const GenerationConfigSchema = z
  .object({
    metadata: MetadataSchema,
    generation_settings: GenerationSettingsSchema,
    element_configs: z.record(z.string().regex(/^[A-Za-z_][\w.-]*$/), ElementConfigSchema).default({}),
    global_overrides: GlobalOverridesSchema.optional(),
    data_contexts: z.record(z.unknown()).optional(),
    smart_relationships: z.record(RelationshipSchema).optional(),
  })
  .strict();

export type GenerationConfigFile = z.infer<typeof GenerationConfigSchema>;

export interface LoadedConfiguration {
  metadata: GenerationConfigFile['metadata'];
  options: GenerationOptions;
  /** Keys that were accepted but have no effect on generation. */
  ignored: string[];
}

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((i) => ({ path: i.path.length > 0 ? i.path.join('.') : '$', message: i.message }));
}

/**
 * Converts a validated configuration document into {@link GenerationOptions}.
 *
 * Keys under `element_configs` are element names or paths. A choice context
 * other than `root` names the child element that holds the choice.
 */
export function toGenerationOptions(config: GenerationConfigFile): GenerationOptions {
  const gs = config.generation_settings;
  const settings: Partial<GeneratorSettings> = {};
  if (gs.global_repeat_count !== undefined) settings.defaultRepeatCount = gs.global_repeat_count;
  if (gs.max_depth !== undefined) settings.maxDepth = gs.max_depth;
  if (gs.include_comments !== undefined) settings.includeComments = gs.include_comments;
  if (gs.deterministic_seed !== undefined) settings.seed = gs.deterministic_seed;

  const choiceSelections = new Map<string, string>();
  const repetitionOverrides = new Map<string, number>();
  const optionalSelections: string[] = [];
  const customValues = new Map<string, readonly CustomScalar[]>();
  const customValueOrder = new Map<string, CustomValueOrder>();

  for (const [element, ec] of Object.entries(config.element_configs)) {
    for (const [context, alternative] of Object.entries(ec.choices ?? {})) {
      choiceSelections.set(context === 'root' ? element : `${element}.${context}`, alternative);
    }
    if (ec.repeat_count !== undefined) repetitionOverrides.set(element, ec.repeat_count);
    for (const optional of ec.include_optional ?? []) optionalSelections.push(`${element}.${optional}`);
    if (ec.custom_values && ec.custom_values.length > 0) customValues.set(element, ec.custom_values);
    if (ec.selection_strategy !== undefined) customValueOrder.set(element, SELECTION_ORDER[ec.selection_strategy]);
  }

  return {
    rootElement: gs.root_element,
    mode: MODES[gs.mode],
    choiceSelections,
    repetitionOverrides,
    optionalSelections,
    customValues,
    customValueOrder,
    settings,
  };
}

/**
 * Dot paths of the keys the file sets that generation does not act on.
 * `template` selection has no template engine behind it and reads as
 * `sequential`.
 */
export function inertConfigKeys(config: GenerationConfigFile): string[] {
  const keys: string[] = [];
  if (config.generation_settings.ensure_unique_combinations !== undefined) {
    keys.push('generation_settings.ensure_unique_combinations');
  }
  for (const [element, ec] of Object.entries(config.element_configs)) {
    if (ec.selection_strategy === 'template') keys.push(`element_configs.${element}.selection_strategy`);
    for (const key of INERT_ELEMENT_KEYS) {
      if (ec[key] !== undefined) keys.push(`element_configs.${element}.${key}`);
    }
  }
  for (const key of Object.keys(config.global_overrides ?? {})) keys.push(`global_overrides.${key}`);
  if (config.data_contexts !== undefined) keys.push('data_contexts');
  if (config.smart_relationships !== undefined) keys.push('smart_relationships');
  return keys;
}

/**
 * Validates an already-parsed configuration object.
 *
 * @throws `ConfigurationError` listing every problem found.
 */
export function parseGenerationConfig(
  json: unknown,
  source = 'configuration object',
  logger: Logger = consoleLogger,
): LoadedConfiguration {
  const parsed = GenerationConfigSchema.safeParse(json);
  if (!parsed.success) throw new ConfigurationError(source, toIssues(parsed.error));
  const ignored = inertConfigKeys(parsed.data);
  if (ignored.length > 0) {
    logger.warn('Configuration keys have no effect on generation', { source, keys: ignored });
  }
  return { metadata: parsed.data.metadata, options: toGenerationOptions(parsed.data), ignored };
}

/**
 * Reads and validates a JSON configuration file.
 *
 * @throws `ConfigurationError` if the file cannot be read, is not JSON, or
 * does not match the configuration schema.
 */
export async function loadGenerationConfig(
  configPath: string,
  logger: Logger = consoleLogger,
): Promise<LoadedConfiguration> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(configPath, [
      { path: '$', message: `cannot read file: ${err instanceof Error ? err.message : String(err)}` },
    ]);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(configPath, [
      { path: '$', message: `not valid JSON: ${err instanceof Error ? err.message : String(err)}` },
    ]);
  }
  return parseGenerationConfig(json, configPath, logger);
}
