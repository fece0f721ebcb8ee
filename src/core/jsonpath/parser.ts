/**
 * Field-path template parser
 *
 * Accepts the subset of the kubectl JSONPath template language needed to
 * address fields of a schemaless object:
 *
 *   {.status.conditions[?(@.type=="Ready")].status}
 *   .spec.containers[*].envFrom[0]['configMapRef'].name
 */

import { PathExpressionError } from '../errors.js';
import type { FilterLiteral, FilterOperator, ParsedPath, PathSegment } from './types.js';

const IDENTIFIER = /[A-Za-z0-9_$-]/;

class PathScanner {
  private pos = 0;

  constructor(
    private readonly source: string,
    private readonly expression: string,
    private readonly offset: number
  ) {}

  get done(): boolean {
    return this.pos >= this.source.length;
  }

  peek(ahead = 0): string | undefined {
    return this.source[this.pos + ahead];
  }

  next(): string | undefined {
    const ch = this.source[this.pos];
    this.pos++;
    return ch;
  }

  skipWhitespace(): void {
    while (this.peek() === ' ' || this.peek() === '\t') {
      this.pos++;
    }
  }

  expect(token: string): void {
    if (!this.source.startsWith(token, this.pos)) {
      throw this.fail(`expected '${token}'`);
    }
    this.pos += token.length;
  }

  tryConsume(token: string): boolean {
    if (this.source.startsWith(token, this.pos)) {
      this.pos += token.length;
      return true;
    }
    return false;
  }

  identifier(): string {
    const start = this.pos;
    while (!this.done && IDENTIFIER.test(this.source[this.pos] ?? '')) {
      this.pos++;
    }
    if (start === this.pos) {
      throw this.fail('expected a field name');
    }
    return this.source.slice(start, this.pos);
  }

  quoted(): string {
    const quote = this.next();
    if (quote !== '"' && quote !== "'") {
      throw this.fail('expected a quoted string');
    }
    let value = '';
    while (!this.done) {
      const ch = this.next();
      if (ch === '\\') {
        const escaped = this.next();
        if (escaped === undefined) break;
        value += escaped;
      } else if (ch === quote) {
        return value;
      } else {
        value += ch;
      }
    }
    throw this.fail('unterminated string');
  }

  integer(): number {
    const start = this.pos;
    if (this.peek() === '-') this.pos++;
    while (!this.done && /[0-9]/.test(this.source[this.pos] ?? '')) {
      this.pos++;
    }
    const text = this.source.slice(start, this.pos);
    if (text === '' || text === '-') {
      throw this.fail('expected an integer');
    }
    return Number.parseInt(text, 10);
  }

  number(): number {
    const match = /^-?\d+(\.\d+)?/.exec(this.source.slice(this.pos));
    if (!match) {
      throw this.fail('expected a number');
    }
    this.pos += match[0].length;
    return Number(match[0]);
  }

  fail(reason: string): PathExpressionError {
    const position = this.offset + this.pos;
    return new PathExpressionError(
      `Invalid path expression '${this.expression}' at position ${position}: ${reason}`,
      this.expression,
      position
    );
  }
}

function parseLiteral(scanner: PathScanner): FilterLiteral {
  const ch = scanner.peek();
  if (ch === '"' || ch === "'") {
    return scanner.quoted();
  }
  if (scanner.tryConsume('true')) return true;
  if (scanner.tryConsume('false')) return false;
  if (ch !== undefined && /[-0-9]/.test(ch)) {
    return scanner.number();
  }
  throw scanner.fail('expected a string, number or boolean literal');
}

function parseFilter(scanner: PathScanner): PathSegment {
  scanner.expect('?(');
  scanner.skipWhitespace();
  scanner.expect('@');

  const path: string[] = [];
  while (scanner.peek() === '.' || scanner.peek() === '[') {
    if (scanner.tryConsume('.')) {
      path.push(scanner.identifier());
    } else {
      scanner.expect('[');
      path.push(scanner.quoted());
      scanner.expect(']');
    }
  }
  if (path.length === 0) {
    throw scanner.fail('filter must compare a field of @');
  }

  scanner.skipWhitespace();
  let operator: FilterOperator;
  if (scanner.tryConsume('==')) {
    operator = '==';
  } else if (scanner.tryConsume('!=')) {
    operator = '!=';
  } else {
    throw scanner.fail("expected '==' or '!='");
  }
  scanner.skipWhitespace();
  const value = parseLiteral(scanner);
  scanner.skipWhitespace();
  scanner.expect(')');

  return { type: 'filter', path, operator, value };
}

function parseBracket(scanner: PathScanner): PathSegment {
  scanner.expect('[');
  scanner.skipWhitespace();

  let segment: PathSegment;
  const ch = scanner.peek();
  if (ch === '*') {
    scanner.next();
    segment = { type: 'wildcard' };
  } else if (ch === '?') {
    segment = parseFilter(scanner);
  } else if (ch === '"' || ch === "'") {
    segment = { type: 'field', name: scanner.quoted() };
  } else {
    segment = { type: 'index', index: scanner.integer() };
  }

  scanner.skipWhitespace();
  scanner.expect(']');
  return segment;
}

/**
 * Parse a field-path template into segments
 */
export function parsePath(expression: string): ParsedPath {
  let body = expression.trim();
  let offset = expression.indexOf(body);

  if (body.startsWith('{')) {
    if (!body.endsWith('}')) {
      throw new PathExpressionError(
        `Invalid path expression '${expression}': unclosed '{'`,
        expression,
        expression.length
      );
    }
    body = body.slice(1, -1).trim();
    offset = expression.indexOf(body, offset + 1);
  }

  const scanner = new PathScanner(body, expression, Math.max(offset, 0));
  scanner.tryConsume('$');

  const segments: PathSegment[] = [];
  while (!scanner.done) {
    const ch = scanner.peek();
    if (ch === '.') {
      scanner.next();
      if (scanner.done) {
        // A bare "." addresses the whole document
        break;
      }
      if (scanner.tryConsume('*')) {
        segments.push({ type: 'wildcard' });
      } else if (scanner.peek() === '[') {
        segments.push(parseBracket(scanner));
      } else {
        segments.push({ type: 'field', name: scanner.identifier() });
      }
    } else if (ch === '[') {
      segments.push(parseBracket(scanner));
    } else {
      throw scanner.fail(`unexpected character '${ch}'`);
    }
  }

  return { expression, segments };
}
