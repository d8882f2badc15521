/**
 * Rewrites generated templates into executable statements and reads the
 * pieces the executor needs from them (kind, placeholders, input columns).
 *
 * Normalisation is advisory: text it does not recognise is returned as-is.
 */

import type { StatementKind } from '../types/models.js';
import { maskLiterals, repairOperators } from './repair.js';

export interface NormalizedStatement {
  text: string;
  kind: StatementKind | null;
  /** Distinct placeholder names in order of first appearance. */
  placeholders: string[];
  inputColumns: string[];
}

const LEADING_KEYWORD = /^\s*(?:--[^\n]*\n\s*)*(INSERT|SELECT|UPDATE|DELETE)\b/i;
const BRACKET_PLACEHOLDER = /<\s*([A-Za-z_]\w*)\s*>/g;
const NAMED_PLACEHOLDER = /(?<![:\w]):([A-Za-z_]\w*)/g;
const COMPARISON = /\s*(?:<>|!=|>=|<=|=|<|>|\bNOT\s+LIKE\b|\bI?LIKE\b|\bNOT\s+IN\b|\bIN\b|\bBETWEEN\b)\s*/i;

/**
 * Leading statement keyword, or null when it is not one of the four.
 */
export function statementKind(sql: string): StatementKind | null {
  const match = LEADING_KEYWORD.exec(sql);
  if (!match) {
    return null;
  }
  switch (match[1].toUpperCase()) {
    case 'INSERT':
      return 'INSERT';
    case 'SELECT':
      return 'SELECT';
    case 'UPDATE':
      return 'UPDATE';
    case 'DELETE':
      return 'DELETE';
    default:
      return null;
  }
}

/**
 * `<name>` → `:name`.
 */
export function unifyPlaceholders(sql: string): string {
  const { masked, restore } = maskLiterals(sql);
  return restore(masked.replace(BRACKET_PLACEHOLDER, ':$1'));
}

/**
 * Distinct `:name` placeholders in first-appearance order.
 * String literals and `::type` casts are skipped.
 */
export function findPlaceholders(sql: string): string[] {
  const { masked } = maskLiterals(sql);
  const names: string[] = [];
  for (const match of masked.matchAll(NAMED_PLACEHOLDER)) {
    if (!names.includes(match[1])) {
      names.push(match[1]);
    }
  }
  return names;
}

/**
 * Strip table prefix, quoting and stray parentheses from a column reference.
 */
export function cleanColumnName(reference: string): string | null {
  const unwrapped = reference.trim().replace(/^\(+|\)+$/g, '').replace(/^NOT\s+/i, '').trim();
  const last = unwrapped.split('.').pop() ?? '';
  const name = last.replace(/[`"[\]]/g, '').trim();
  return /^[A-Za-z_][\w$]*$/.test(name) ? name : null;
}

function unique(names: Array<string | null>): string[] {
  const result: string[] = [];
  for (const name of names) {
    if (name && !result.includes(name)) {
      result.push(name);
    }
  }
  return result;
}

function hasPlaceholder(text: string): boolean {
  NAMED_PLACEHOLDER.lastIndex = 0;
  return NAMED_PLACEHOLDER.test(text);
}

/**
 * Left-hand sides of `lhs <op> rhs` pieces whose right side takes user input.
 */
function inputSides(pieces: string[], operator: RegExp): string[] {
  return unique(
    pieces.map((piece) => {
      const [lhs, ...rhs] = piece.split(operator);
      return rhs.length > 0 && hasPlaceholder(rhs.join(' ')) ? cleanColumnName(lhs) : null;
    }),
  );
}

/**
 * Columns a statement takes user input for.
 *
 * - INSERT: the column list after the table name
 * - UPDATE: assigned columns in SET
 * - DELETE / SELECT: predicate columns in WHERE
 */
export function extractColumns(sql: string): string[] {
  const { masked } = maskLiterals(sql);

  switch (statementKind(masked)) {
    case 'INSERT': {
      const match = /^\s*INSERT\s+INTO\s+[^\s(]+\s*\(([^)]*)\)/i.exec(masked);
      return match ? unique(match[1].split(',').map(cleanColumnName)) : [];
    }

    case 'UPDATE': {
      const match = /\bSET\s+([\s\S]*?)(?:\s+WHERE\b|\s+RETURNING\b|;|$)/i.exec(masked);
      return match ? inputSides(match[1].split(','), /=/) : [];
    }

    case 'DELETE':
    case 'SELECT': {
      const match =
        /\bWHERE\b([\s\S]*?)(?:\bGROUP\s+BY\b|\bORDER\s+BY\b|\bHAVING\b|\bLIMIT\b|\bRETURNING\b|;|$)/i.exec(masked);
      return match ? inputSides(match[1].split(/\bAND\b|\bOR\b|,/i), COMPARISON) : [];
    }

    default:
      return [];
  }
}

/**
 * Produce the executable form of a template.
 *
 * Idempotent: `normalize(normalize(q).text).text === normalize(q).text`.
 */
export function normalize(template: string): NormalizedStatement {
  const kind = statementKind(template);
  if (!kind) {
    return { text: template, kind: null, placeholders: findPlaceholders(template), inputColumns: [] };
  }

  const text = repairOperators(unifyPlaceholders(template));
  return {
    text,
    kind,
    placeholders: findPlaceholders(text),
    inputColumns: extractColumns(text),
  };
}
