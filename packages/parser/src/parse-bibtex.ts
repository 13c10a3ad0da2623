/**
 * BibTeX source to bibliography elements.
 *
 * The grammar is tolerant: an object that cannot be read is kept as a
 * `ParseFailure` spanning from its `@` to the next line starting with `@`,
 * and reading resumes there. Text between objects becomes meta comments.
 */

import type { ParseOptions } from '@bibkit/contracts';
import { BibtexSyntaxError, createLogger, type Logger } from '@bibkit/shared';
import {
  Comment,
  Entry,
  MetaComment,
  ParseFailure,
  Preamble,
  StringConstant,
  Value,
  reference,
  resolveParseOptions,
  type Element,
  type ValuePart,
} from '@bibkit/kernel';
import { Scanner } from './scanner.js';
import { SPECIAL_OBJECTS, type SpecialObject } from './types.js';

const CLOSERS: Readonly<Record<string, string>> = { '{': '}', '(': ')' };

function isSpecialObject(type: string): type is SpecialObject {
  return SPECIAL_OBJECTS.some((special) => special === type);
}

/**
 * Offset where reading resumes after a failure at `start`: the beginning of
 * the next line whose first non-blank character is `@`, or the end of input.
 */
function recoveryPoint(text: string, start: number): number {
  const pattern = /\n[ \t]*@/g;
  pattern.lastIndex = start + 1;
  const match = pattern.exec(text);
  return match ? match.index + 1 : text.length;
}

/**
 * Parse BibTeX source into elements, in source order.
 *
 * Never throws for malformed input. Fragments that cannot be read are
 * logged at warn and, with `includeErrors`, returned as `ParseFailure`s.
 *
 * @example
 * ```typescript
 * const elements = parseBibtex('@book{knuth, title = {TAOCP}}');
 * // [Entry { key: 'knuth', type: 'book' }]
 * ```
 */
export function parseBibtex(
  text: string,
  options: ParseOptions = {},
  logger: Logger = createLogger(),
): Element[] {
  const config = resolveParseOptions(options);
  const elements: Element[] = [];
  let position = 0;

  while (position < text.length) {
    const at = text.indexOf('@', position);
    const end = at < 0 ? text.length : at;

    const meta = text.slice(position, end);
    if (config.includeMetaContent && meta.trim() !== '') {
      elements.push(new MetaComment(meta));
    }
    if (at < 0) {
      break;
    }

    const scanner = new Scanner(text, at);
    try {
      elements.push(readObject(scanner, config));
      position = scanner.position;
    } catch (error) {
      if (!(error instanceof BibtexSyntaxError)) {
        throw error;
      }

      position = recoveryPoint(text, at);
      logger.warn('Skipping unparsable object', {
        offset: at,
        errorOffset: error.offset,
        reason: error.message,
      });
      if (config.includeErrors) {
        elements.push(new ParseFailure(text.slice(at, position), error.message, at));
      }
    }
  }

  logger.debug('Parsed BibTeX source', { length: text.length, elements: elements.length });
  return elements;
}

function readObject(scanner: Scanner, config: Required<ParseOptions>): Element {
  scanner.expect('@');
  scanner.skipWhitespace();
  const type = scanner.readIdentifier('an object type').toLowerCase();
  scanner.skipWhitespace();

  const open = scanner.peek();
  const close = CLOSERS[open];
  if (close === undefined) {
    throw scanner.error("Expected '{' or '('");
  }

  if (!isSpecialObject(type)) {
    scanner.expect(open);
    return readEntry(scanner, type, close, config);
  }

  switch (type) {
    case 'comment':
      return new Comment(scanner.readBalanced(open, close).trim());
    case 'preamble': {
      scanner.expect(open);
      const value = readValue(scanner);
      closeObject(scanner, close);
      return new Preamble(value);
    }
    case 'string': {
      scanner.expect(open);
      scanner.skipWhitespace();
      const name = scanner.readIdentifier('a string name');
      scanner.skipWhitespace();
      scanner.expect('=');
      const value = readValue(scanner);
      closeObject(scanner, close);
      return new StringConstant(name, value);
    }
  }
}

function closeObject(scanner: Scanner, close: string): void {
  scanner.skipWhitespace();
  scanner.accept(',');
  scanner.skipWhitespace();
  scanner.expect(close);
}

function readEntry(scanner: Scanner, type: string, close: string, config: Required<ParseOptions>): Entry {
  scanner.skipWhitespace();
  const keyStart = scanner.position;
  let key = scanner.readKey(close);
  scanner.skipWhitespace();

  let first = false;
  if (key === '' || scanner.peek() === '=') {
    if (!config.allowMissingKeys) {
      throw new BibtexSyntaxError(`Entry of type '${type}' has no citation key`, keyStart);
    }
    // `@misc{title = ...}`: what looked like a key is the first field name
    if (key !== '') {
      scanner.position = keyStart;
      first = true;
    }
    key = '';
  }

  const entry = new Entry({ type, key });

  for (;;) {
    scanner.skipWhitespace();
    if (scanner.accept(close)) {
      return entry;
    }
    if (!first) {
      scanner.expect(',');
      scanner.skipWhitespace();
      if (scanner.accept(close)) {
        return entry;
      }
    }
    first = false;

    const name = scanner.readIdentifier('a field name');
    scanner.skipWhitespace();
    scanner.expect('=');
    entry.set(name, readValue(scanner));
  }
}

/**
 * Read `part # part # ...` where a part is braced, quoted, a number or a
 * string constant name.
 */
function readValue(scanner: Scanner): Value {
  const parts: ValuePart[] = [];

  do {
    scanner.skipWhitespace();
    const char = scanner.peek();
    if (char === '{') {
      parts.push(scanner.readBalanced('{', '}'));
    } else if (char === '"') {
      parts.push(scanner.readQuoted());
    } else if (scanner.isDigit()) {
      parts.push(scanner.readDigits());
    } else if (scanner.isIdentifierStart()) {
      parts.push(reference(scanner.readIdentifier('a string name')));
    } else {
      throw scanner.error('Expected a value');
    }
    scanner.skipWhitespace();
  } while (scanner.accept('#'));

  return Value.from(parts);
}
