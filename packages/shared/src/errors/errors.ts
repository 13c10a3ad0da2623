/**
 * Base error class for bibkit
 */
export class BibkitError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'BibkitError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }

    // Maintains proper stack trace for where error was thrown

    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Error thrown when something other than a bibliography element is handed
 * to a container.
 */
export class ElementTypeError extends BibkitError {
  readonly received: string;

  constructor(message: string, received: unknown) {
    const receivedType = describeType(received);
    super(`${message}; was: ${receivedType}`, 'ELEMENT_TYPE_ERROR', { received: receivedType });
    this.name = 'ElementTypeError';
    this.received = receivedType;
  }
}

/**
 * Error thrown when an element already belongs to another bibliography
 */
export class ElementOwnershipError extends BibkitError {
  readonly ownerId: string;

  constructor(ownerId: string, context?: Record<string, unknown>) {
    super(
      `Element is attached to bibliography '${ownerId}'; delete it there first`,
      'ELEMENT_OWNERSHIP_ERROR',
      { ...context, ownerId },
    );
    this.name = 'ElementOwnershipError';
    this.ownerId = ownerId;
  }
}

/**
 * Error thrown for configuration issues
 */
export class ConfigurationError extends BibkitError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', context);
    this.name = 'ConfigurationError';
  }
}

/**
 * Error raised while reading bibliography source text.
 * Parsers convert it into a retained error fragment instead of throwing it.
 */
export class BibtexSyntaxError extends BibkitError {
  /** Offset in the source text where the problem was found */
  readonly offset: number;

  constructor(message: string, offset: number) {
    super(message, 'SYNTAX_ERROR', { offset });
    this.name = 'BibtexSyntaxError';
    this.offset = offset;
  }
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'Array';
  if (typeof value === 'object') {
    return value.constructor?.name ?? 'Object';
  }
  return typeof value;
}
