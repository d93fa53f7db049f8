/**
 * Template Forge Error Classes
 *
 * Structured error hierarchy for template resolution.
 * Every error carries a stable code for programmatic handling and an
 * optional context record for logging.
 *
 * @example
 * ```typescript
 * try {
 *   await manager.resolve('vue', 'basic');
 * } catch (error) {
 *   if (isTemplateForgeError(error)) {
 *     switch (error.code) {
 *       case TemplateErrorCode.TEMPLATE_NOT_FOUND:
 *         console.log('No registry entry provides this template');
 *         break;
 *       case TemplateErrorCode.INTEGRITY_ERROR:
 *         console.log('Downloaded archive did not match its checksum');
 *         break;
 *     }
 *   }
 * }
 * ```
 */

export enum TemplateErrorCode {
  /** Network, authentication or missing path at the adapter boundary */
  SOURCE_UNAVAILABLE = 'SOURCE_UNAVAILABLE',

  /** Downloaded content did not match the configured checksum */
  INTEGRITY_ERROR = 'INTEGRITY_ERROR',

  /** No registry entry produced the requested template */
  TEMPLATE_NOT_FOUND = 'TEMPLATE_NOT_FOUND',

  /** Template descriptor is missing or malformed */
  TEMPLATE_PROCESSING = 'TEMPLATE_PROCESSING',

  /** Registry configuration is invalid */
  CONFIGURATION = 'CONFIGURATION',
}

/**
 * Base error class for all template forge errors
 */
export abstract class TemplateForgeError extends Error {
  abstract readonly code: TemplateErrorCode;

  constructor(
    message: string,
    public readonly context?: Readonly<Record<string, unknown>>,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging (cause is left out to avoid leaking credentials)
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

export class SourceUnavailableError extends TemplateForgeError {
  readonly code = TemplateErrorCode.SOURCE_UNAVAILABLE;
}

/**
 * Thrown when a downloaded archive does not match its expected digest.
 * Never retried and never cached.
 */
export class IntegrityError extends TemplateForgeError {
  readonly code = TemplateErrorCode.INTEGRITY_ERROR;

  constructor(
    message: string,
    public readonly expected: string,
    public readonly actual: string,
    context?: Record<string, unknown>
  ) {
    super(message, { ...context, expected, actual });
  }
}

export class TemplateNotFoundError extends TemplateForgeError {
  readonly code = TemplateErrorCode.TEMPLATE_NOT_FOUND;

  constructor(
    public readonly key: string,
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(`Template not found: ${key}`, { ...context, key }, cause);
  }
}

export class TemplateProcessingError extends TemplateForgeError {
  readonly code = TemplateErrorCode.TEMPLATE_PROCESSING;
}

export class ConfigurationError extends TemplateForgeError {
  readonly code = TemplateErrorCode.CONFIGURATION;
}

export function isTemplateForgeError(error: unknown): error is TemplateForgeError {
  return error instanceof TemplateForgeError;
}

/**
 * Extract a printable message from any thrown value
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}
