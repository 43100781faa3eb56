import { DocumentTreeBuilder, type TreeSelections } from './builder/tree-builder.js';
import { resolveSettings, type GenerationOptions, type GeneratorSettings } from './config/options.js';
import { ConstraintExtractor } from './constraints/extractor.js';
import type { GeneratorContext } from './generators/base.js';
import { EnumUsageTracker } from './generators/enum-usage-tracker.js';
import { TypeGeneratorFactory } from './generators/factory.js';
import { IdentifierSequence } from './generators/identifier.js';
import { consoleLogger, type Logger } from './logger.js';
import { PATTERN_FALLBACK, PatternSynthesizer } from './patterns/synthesizer.js';
import { XorShift32 } from './rng.js';
import type { Diagnostics, DocumentNode } from './types.js';
import { toMap } from './utils.js';
import { MissingRootError } from './validation/errors.js';
import { serializeDocument } from './xml/serializer.js';
import { parseXsd } from './xsd/parser.js';
import type { SchemaModel } from './xsd/types.js';
import { SchemaWalker } from './xsd/walker.js';

export interface GenerationResult {
  tree: DocumentNode;
  diagnostics: Diagnostics;
}

export interface SampleXmlResult {
  xml: string;
  diagnostics: Diagnostics;
}

function emptyDiagnostics(): Diagnostics {
  return {
    cycleGuardHits: 0,
    depthGuardHits: 0,
    patternFallbacks: 0,
    enumerationFallbacks: 0,
    elementsGenerated: 0,
    valuesGenerated: 0,
  };
}

/**
 * Generates sample documents for one schema.
 *
 * Every {@link run} starts from a clean slate (enumeration usage, identifier
 * counters, custom-value cursors, diagnostics), so the same schema and options
 * always give the same document.
 */
export class GenerationSession {
  readonly settings: Readonly<GeneratorSettings>;
  private readonly walker: SchemaWalker;
  private readonly logger: Logger;
  private readonly selections: TreeSelections;
  private readonly enumUsage = new EnumUsageTracker();
  private readonly identifiers = new IdentifierSequence();
  private readonly extractor: ConstraintExtractor;
  private readonly factory = new TypeGeneratorFactory();
  private readonly patterns: PatternSynthesizer;
  private diagnostics: Diagnostics = emptyDiagnostics();

  constructor(
    schema: SchemaModel,
    private readonly options: GenerationOptions = {},
  ) {
    this.walker = new SchemaWalker(schema);
    this.logger = options.logger ?? consoleLogger;
    this.settings = resolveSettings(options.settings);
    this.extractor = new ConstraintExtractor(this.logger);
    this.patterns = new PatternSynthesizer({
      onFallback: (pattern, lastValue) => {
        this.diagnostics.patternFallbacks += 1;
        this.logger.warn('Could not produce a value matching the pattern, using the fallback', {
          pattern,
          lastValue,
          fallback: PATTERN_FALLBACK,
        });
      },
    });
    this.selections = {
      mode: options.mode ?? 'minimal',
      choiceSelections: toMap(options.choiceSelections),
      repetitionOverrides: toMap(options.repetitionOverrides),
      optionalSelections: new Map([...(options.optionalSelections ?? [])].map((p): [string, true] => [p, true])),
      customValues: toMap(options.customValues),
      customValueOrder: toMap(options.customValueOrder),
    };
  }

  /** Name of the element the document is generated from. */
  get rootElement(): string {
    return this.options.rootElement ?? this.walker.schema.rootElement;
  }

  /**
   * Builds one document tree.
   *
   * @throws `MissingRootError` if the schema declares no global element or
   * the requested root is not one of them.
   */
  run(): GenerationResult {
    this.enumUsage.reset();
    this.identifiers.reset();
    this.diagnostics = emptyDiagnostics();

    const rootName = this.rootElement;
    if (!rootName || this.walker.schema.elements.size === 0) {
      throw new MissingRootError('Schema declares no global element to generate from.');
    }
    const root = this.walker.rootNode(rootName);
    if (!root) {
      const known = [...this.walker.schema.elements.keys()].join(', ');
      throw new MissingRootError(`Root element "${rootName}" is not a global element of the schema (found: ${known}).`, rootName);
    }

    const context: GeneratorContext = {
      rng: new XorShift32(this.settings.seed),
      enumUsage: this.enumUsage,
      identifiers: this.identifiers,
      patterns: this.patterns,
      settings: this.settings,
      logger: this.logger,
      diagnostics: this.diagnostics,
    };
    const builder = new DocumentTreeBuilder(this.extractor, this.factory, context, this.selections);
    const tree = builder.build(root);

    const { cycleGuardHits, depthGuardHits } = this.diagnostics;
    if (cycleGuardHits > 0 || depthGuardHits > 0) {
      this.logger.warn('Some subtrees were cut off by the recursion guards', {
        rootElement: rootName,
        cycleGuardHits,
        depthGuardHits,
        maxDepth: this.settings.maxDepth,
      });
    }
    return { tree, diagnostics: { ...this.diagnostics } };
  }

  /** Renders a tree (by default a fresh run) as XML text. */
  toXml(tree: DocumentNode = this.run().tree): string {
    return serializeDocument(tree, {
      prettyPrint: this.options.prettyPrint ?? true,
      xmlDeclaration: this.options.xmlDeclaration ?? true,
      encoding: this.options.encoding ?? 'UTF-8',
      includeComments: this.settings.includeComments,
      targetNamespace: this.walker.schema.targetNamespace,
    });
  }
}

/**
 * Generates a sample XML document for an XSD file.
 *
 * @param xsdPath - Path to the `.xsd` file (absolute or relative to `xsdBaseDir`).
 * @param options - Optional configuration.
 * @returns The XML text and the run's diagnostics.
 *
 * @throws `XsdParseError`      if the XSD file cannot be read or parsed.
 * @throws `MissingRootError`   if there is no element to generate from.
 * @throws `ConfigurationError` if the settings or environment overrides are invalid.
 *
 * @example
 * ```typescript
 * import { generateSampleXml } from 'xsd-sample-generator';
 *
 * const { xml, diagnostics } = await generateSampleXml('./order.xsd', {
 *   mode: 'complete',
 *   choiceSelections: { 'Order.Payment': 'Card' },
 *   repetitionOverrides: { Item: 3 },
 * });
 * ```
 */
export async function generateSampleXml(xsdPath: string, options: GenerationOptions = {}): Promise<SampleXmlResult> {
  const schema = await parseXsd(xsdPath, options.xsdBaseDir, options.logger ?? consoleLogger);
  const session = new GenerationSession(schema, options);
  const { tree, diagnostics } = session.run();
  return { xml: session.toXml(tree), diagnostics };
}

/** Same as {@link generateSampleXml}, returning only the XML text. */
export async function generateXmlFromXsd(xsdPath: string, options: GenerationOptions = {}): Promise<string> {
  const { xml } = await generateSampleXml(xsdPath, options);
  return xml;
}
