import { format } from 'date-fns';
import { ParameterSnapshot } from './types';

const DATE_LITERAL_FORMAT = 'yyyy-MM-dd HH:mm:ss.SSS';
const IDENTIFIER_START = /[A-Za-z_]/;
const IDENTIFIER_PART = /\w/;
const DIGIT = /\d/;

export function bytesToHex(value: Uint8Array): string {
  return `0x${Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString('hex').toUpperCase()}`;
}

function quote(text: string): string {
  return `'${text.replace(/'/g, "''")}'`;
}

/**
 * Encodes a parameter value as an inline SQL literal
 */
export function toSqlLiteral(value: unknown): string {
  if (value === null || value === undefined) return 'NULL';

  switch (typeof value) {
    case 'string':
      return quote(value);
    case 'boolean':
      return value ? '1' : '0';
    case 'number':
      return Number.isFinite(value) ? String(value) : 'NULL';
    case 'bigint':
      return value.toString();
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'NULL' : quote(format(value, DATE_LITERAL_FORMAT));
  }
  if (value instanceof Uint8Array) {
    return bytesToHex(value);
  }
  if (Array.isArray(value)) {
    return toListLiteral(value);
  }
  if (typeof value === 'object') {
    try {
      return quote(JSON.stringify(value));
    } catch {
      return quote(String(value));
    }
  }
  return quote(String(value));
}

/**
 * Arrays expand the way Sequelize expands replacements: `IN (:ids)` with
 * [1, 2] becomes `IN (1, 2)`, and nested arrays become row tuples.
 */
function toListLiteral(values: readonly unknown[]): string {
  if (values.length === 0) return 'NULL';
  return values
    .map(element => (Array.isArray(element) ? `(${toListLiteral(element)})` : toSqlLiteral(element)))
    .join(', ');
}

function hasParameter(parameters: ParameterSnapshot, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(parameters, name);
}

function lookup(parameters: ParameterSnapshot, token: string, bareName?: string): string | undefined {
  if (hasParameter(parameters, token)) return toSqlLiteral(parameters[token]);
  if (bareName !== undefined && hasParameter(parameters, bareName)) return toSqlLiteral(parameters[bareName]);
  return undefined;
}

function readWhile(text: string, start: number, pattern: RegExp): number {
  let end = start;
  while (end < text.length && pattern.test(text[end])) end++;
  return end;
}

/**
 * Replaces parameter placeholders (@name, $name, $1, :name and positional ?)
 * with literals in a single pass. Quoted strings, quoted identifiers and
 * comments are copied unchanged, and placeholders without a value are left
 * in place.
 */
export function substituteParameters(commandText: string, parameters: ParameterSnapshot): string {
  if (Object.keys(parameters).length === 0) {
    return commandText;
  }

  const text = commandText;
  let result = '';
  let position = 0;
  let positional = 0;

  while (position < text.length) {
    const ch = text[position];
    const next = text[position + 1] ?? '';

    // quoted literal or identifier, doubled quote stays inside
    if (ch === "'" || ch === '"' || ch === '`') {
      let end = position + 1;
      while (end < text.length) {
        if (text[end] === ch) {
          if (text[end + 1] === ch) {
            end += 2;
            continue;
          }
          break;
        }
        end++;
      }
      result += text.slice(position, end + 1);
      position = end + 1;
      continue;
    }

    if (ch === '-' && next === '-') {
      const end = text.indexOf('\n', position);
      const stop = end === -1 ? text.length : end;
      result += text.slice(position, stop);
      position = stop;
      continue;
    }

    if (ch === '/' && next === '*') {
      const end = text.indexOf('*/', position + 2);
      const stop = end === -1 ? text.length : end + 2;
      result += text.slice(position, stop);
      position = stop;
      continue;
    }

    if ((ch === '@' && next === '@') || (ch === ':' && next === ':') || (ch === '$' && next === '$')) {
      result += ch + next;
      position += 2;
      continue;
    }

    if ((ch === '@' || ch === ':' || ch === '$') && IDENTIFIER_START.test(next)) {
      const end = readWhile(text, position + 1, IDENTIFIER_PART);
      const token = text.slice(position, end);
      result += lookup(parameters, token, token.slice(1)) ?? token;
      position = end;
      continue;
    }

    if (ch === '$' && DIGIT.test(next)) {
      const end = readWhile(text, position + 1, DIGIT);
      const token = text.slice(position, end);
      result += lookup(parameters, token) ?? token;
      position = end;
      continue;
    }

    if (ch === '?') {
      positional++;
      result += lookup(parameters, `?${positional}`) ?? ch;
      position++;
      continue;
    }

    result += ch;
    position++;
  }

  return result;
}
