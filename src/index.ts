export { generateSampleXml, generateXmlFromXsd, GenerationSession } from './session.js';
export type { GenerationResult, SampleXmlResult } from './session.js';

export { DEFAULT_SETTINGS, resolveSettings, settingsFromEnv } from './config/options.js';
export type { GenerationOptions, GeneratorSettings } from './config/options.js';
export { inertConfigKeys, loadGenerationConfig, parseGenerationConfig, toGenerationOptions } from './config/loader.js';
export type { GenerationConfigFile, LoadedConfiguration } from './config/loader.js';

export { parseXsd, parseXsdString } from './xsd/parser.js';
export type { SchemaModel } from './xsd/types.js';
export { SchemaWalker } from './xsd/walker.js';
export { analyzeSchema } from './xsd/analyzer.js';
export type {
  AnalyzeOptions,
  ChoiceSummary,
  ElementSummary,
  RepeatableSummary,
  SchemaAnalysis,
} from './xsd/analyzer.js';
export type { PrimitiveKind, TypeDescriptor } from './xsd/descriptor.js';

export { ConstraintExtractor } from './constraints/extractor.js';
export type { ConstraintSet } from './constraints/extractor.js';
export { PatternSynthesizer, PATTERN_FALLBACK } from './patterns/synthesizer.js';
export { TypeGeneratorFactory } from './generators/factory.js';
export type { GeneratorContext, TypeGenerator } from './generators/base.js';
export { EnumUsageTracker } from './generators/enum-usage-tracker.js';
export { DocumentTreeBuilder } from './builder/tree-builder.js';

export { serializeDocument } from './xml/serializer.js';
export type { SerializeOptions } from './xml/serializer.js';
export { toLexical } from './values.js';

export { consoleLogger, silentLogger } from './logger.js';
export type { Logger } from './logger.js';

export { ConfigurationError, MissingRootError, XsdParseError } from './validation/errors.js';
export type { ValidationIssue } from './validation/errors.js';

export type {
  CustomValue,
  CustomValueOrder,
  Diagnostics,
  DocumentElement,
  DocumentMarker,
  DocumentNode,
  GeneratedValue,
  GenerationMode,
  SchemaNode,
} from './types.js';
