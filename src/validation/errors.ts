/**
 * Represents a single problem found in a configuration document.
 */
export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Thrown when a generation configuration (file, object or environment)
 * does not match the expected shape.
 */
export class ConfigurationError extends Error {
  public readonly issues: ValidationIssue[];

  constructor(source: string, issues: ValidationIssue[]) {
    const summary = issues.map((i) => `  [${i.path}] ${i.message}`).join('\n');
    super(`Invalid generation configuration in ${source}:\n${summary}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Thrown when the schema has no element to generate from, or when the
 * requested root element is not declared globally.
 */
export class MissingRootError extends Error {
  public readonly rootElement: string | undefined;

  constructor(message: string, rootElement?: string) {
    super(message);
    this.name = 'MissingRootError';
    this.rootElement = rootElement;
    Object.setPrototypeOf(this, MissingRootError.prototype);
  }
}

/**
 * Thrown when the XSD file cannot be read or parsed.
 */
export class XsdParseError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'XsdParseError';
    Object.setPrototypeOf(this, XsdParseError.prototype);
  }
}
