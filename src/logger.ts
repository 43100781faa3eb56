/**
 * Minimal logging seam. The generator degrades locally instead of throwing,
 * so warnings are the only trace a caller gets of a fallback being taken.
 */
export interface Logger {
  debug(message: string, details?: Record<string, unknown>): void;
  warn(message: string, details?: Record<string, unknown>): void;
}

const PREFIX = '[xsd-sample]';

function isDebugEnabled(): boolean {
  const flag = process.env.XSD_SAMPLE_DEBUG;
  return flag !== undefined && flag !== '' && flag !== '0' && flag !== 'false';
}

export const consoleLogger: Logger = {
  debug(message, details) {
    if (!isDebugEnabled()) return;
    if (details) console.debug(`${PREFIX} ${message}`, details);
    else console.debug(`${PREFIX} ${message}`);
  },
  warn(message, details) {
    if (details) console.warn(`${PREFIX} ${message}`, details);
    else console.warn(`${PREFIX} ${message}`);
  },
};

export const silentLogger: Logger = {
  debug() {},
  warn() {},
};
