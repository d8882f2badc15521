/**
 * Statement execution: bind, run inside one transaction, classify failures.
 *
 * Phases per call: preparing → binding → executing → committed | rolled_back.
 * Every path that opens a transaction either commits it once or rolls it back
 * once, and the session is released before the result is returned.
 */

import type { Knex } from 'knex';
import type {
  AffectedOutcome,
  ExecutionOutcome,
  ExecutionResult,
  FailureOutcome,
  InputParameter,
} from '../types/models.js';
import { isRecord, type BindValue, type ParameterValues, type Row } from '../types/utils.js';
import { logger } from '../utils/logger.js';
import type { Backend, ErrorClass } from './backends.js';
import type { ConnectionManager } from './connection.js';
import { normalize, type NormalizedStatement } from './normalizer.js';
import { MASK, maskLiterals, suggestRepair } from './repair.js';

export const REFERENCED_ELSEWHERE =
  'Foreign key constraint error: Cannot delete or update this record as it is referenced elsewhere.';

const NAMED_PLACEHOLDER = /(?<![:\w]):([A-Za-z_]\w*)/g;

const NETWORK_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'EPIPE',
]);

export type ExecutionPhase = 'idle' | 'preparing' | 'binding' | 'executing' | 'committed' | 'rolled_back';

export interface ExecutionInput {
  template: string;
  /** Declared parameters; defaults to the placeholders found in the template. */
  parameters?: InputParameter[];
  values: ParameterValues;
}

export interface ExecutorOptions {
  /** Null out nullable foreign keys pointing at rows before deleting them. */
  clearDependents: boolean;
}

interface CompiledStatement {
  sql: string;
  bindings: BindValue[];
  unbound: string[];
}

/**
 * Build the name → value map for a statement.
 *
 * Named values are matched by parameter name. Ordered values are matched by
 * position against the declared parameters in the order they first appear in
 * the statement. Extra values are ignored; missing ones stay unbound.
 */
export function bindParameters(
  placeholders: string[],
  declared: InputParameter[] | undefined,
  values: ParameterValues,
): Record<string, BindValue> {
  const names = declared ? declared.map((p) => p.name) : placeholders;
  const bound: Record<string, BindValue> = {};

  if (Array.isArray(values)) {
    const order = placeholders.filter((name) => names.includes(name));
    order.slice(0, values.length).forEach((name, index) => {
      bound[name] = values[index];
    });
    return bound;
  }

  for (const name of names) {
    if (Object.hasOwn(values, name)) {
      bound[name] = values[name];
    }
  }
  return bound;
}

/**
 * Turn `:name` placeholders into positional `?` bindings.
 * Unbound placeholders still become `?`, so the driver layer rejects the count.
 *
 * A quoted literal containing `?` is sent as a bound value instead, so knex
 * does not count it as a binding. Any other `?` (the jsonb `?` operators) is
 * written as `\?` when `escapeQuestionMarks` is set.
 */
export function compileBindings(
  text: string,
  bound: Record<string, BindValue>,
  escapeQuestionMarks = false,
): CompiledStatement {
  const { masked, literals, restore } = maskLiterals(text);
  const bindings: BindValue[] = [];
  const unbound: string[] = [];
  const token = new RegExp(`${MASK}(\\d+)${MASK}|${NAMED_PLACEHOLDER.source}|\\?`, 'g');

  const sql = masked.replace(
    token,
    (match: string, index: string | undefined, name: string | undefined, offset: number, whole: string) => {
      if (index !== undefined) {
        const literal = literals[Number(index)] ?? '';
        if (!literal.includes('?')) {
          return match;
        }
        // E'..', N'..', X'..' and friends keep their prefix, so stay inline.
        if (offset > 0 && /[\w&]/.test(whole[offset - 1])) {
          return escapeQuestionMarks ? literal.replace(/\?/g, '\\?') : literal;
        }
        bindings.push(literal.slice(1, -1).replace(/''/g, "'"));
        return '?';
      }
      if (name !== undefined) {
        if (Object.hasOwn(bound, name)) {
          bindings.push(bound[name]);
        } else if (!unbound.includes(name)) {
          unbound.push(name);
        }
        return '?';
      }
      return escapeQuestionMarks ? '\\?' : '?';
    },
  );

  return { sql: restore(sql), bindings, unbound };
}

/**
 * Target table of `DELETE FROM <table> ...`, unquoted, without schema prefix.
 */
export function deleteTarget(statement: string): string | null {
  const match = /^\s*(?:--[^\n]*\n\s*)*DELETE\s+FROM\s+((?:[\w$]+|"[^"]+"|`[^`]+`)(?:\.(?:[\w$]+|"[^"]+"|`[^`]+`))?)/i.exec(
    statement,
  );
  if (!match) {
    return null;
  }
  const last = match[1].split('.').pop() ?? '';
  return last.replace(/[`"]/g, '');
}

/**
 * `DELETE FROM t USING u ...`: the target rows depend on another table, so
 * they cannot be read back with `SELECT * FROM t ...`.
 */
export function hasUsingClause(statement: string): boolean {
  const { masked } = maskLiterals(statement);
  return /^\s*(?:--[^\n]*\n\s*)*DELETE\s+FROM\s+\S+(?:\s+(?:AS\s+)?(?!(?:USING|WHERE|RETURNING)\b)\w+)?\s+USING\b/i.test(
    masked,
  );
}

function errorCode(error: unknown): string | undefined {
  const code = isRecord(error) ? error.code : undefined;
  return typeof code === 'string' ? code : undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function genericClass(error: unknown, code: string | undefined): ErrorClass {
  if ((code && NETWORK_CODES.has(code)) || (error instanceof Error && error.name === 'KnexTimeoutError')) {
    return { kind: 'operational' };
  }
  return { kind: 'unknown' };
}

/**
 * Map a driver error onto the failure taxonomy.
 */
export function classifyFailure(
  error: unknown,
  backend: Backend,
  statement: string,
  unbound: string[] = [],
): FailureOutcome {
  const message = errorMessage(error);
  const code = errorCode(error);
  const errorClass = (code ? backend.classify(code, message) : undefined) ?? genericClass(error, code);

  switch (errorClass.kind) {
    case 'constraint_violation':
      return {
        type: 'failure',
        kind: 'constraint_violation',
        message: errorClass.referential ? REFERENCED_ELSEWHERE : `Constraint violation: ${message}`,
      };

    case 'syntax_defect': {
      const suggestedFix = suggestRepair(statement);
      return suggestedFix
        ? { type: 'failure', kind: 'syntax_defect', message, suggestedFix }
        : { type: 'failure', kind: 'syntax_defect', message };
    }

    case 'operational':
      return { type: 'failure', kind: 'operational', message };

    case 'unknown':
      return {
        type: 'failure',
        kind: 'unknown',
        message:
          unbound.length > 0
            ? `${message} (unbound placeholders: ${unbound.map((name) => `:${name}`).join(', ')})`
            : message,
      };
  }
}

function isKeyValue(value: unknown): value is string | number {
  return typeof value === 'string' || typeof value === 'number';
}

function keyValues(rows: Row[], column: string): Array<string | number> {
  return [...new Set(rows.map((row) => row[column]).filter(isKeyValue))];
}

/**
 * Service for executing normalized statements against the active connection.
 */
export class QueryExecutor {
  constructor(
    private connections: ConnectionManager,
    private options: ExecutorOptions = { clearDependents: true },
  ) {}

  async execute(input: ExecutionInput): Promise<ExecutionResult> {
    let phase: ExecutionPhase = 'preparing';
    const normalized = normalize(input.template);

    phase = 'binding';
    const bound = bindParameters(normalized.placeholders, input.parameters, input.values);

    const outcome = await this.connections.withSession(async ({ db, backend }) => {
      const compiled = compileBindings(normalized.text, bound, backend.unescapesQuestionMarks);
      logger.debug({ phase, kind: normalized.kind, bound: Object.keys(bound) }, 'Statement bound');

      let trx: Knex.Transaction;
      try {
        trx = await db.transaction();
      } catch (error) {
        logger.error({ err: error }, 'Failed to open transaction');
        const failure: FailureOutcome = { type: 'failure', kind: 'connection', message: errorMessage(error) };
        return failure;
      }

      phase = 'executing';
      try {
        const result = await this.dispatch(trx, backend, normalized, compiled);
        await trx.commit();
        phase = 'committed';
        return result;
      } catch (error) {
        await this.rollback(trx);
        phase = 'rolled_back';
        const failure = classifyFailure(error, backend, normalized.text, compiled.unbound);
        logger.warn({ kind: failure.kind, err: error }, 'Statement rolled back');
        return failure;
      }
    });

    logger.debug({ phase, outcome: outcome.type }, 'Execution finished');
    return { statement: normalized.text, bound, outcome };
  }

  private async dispatch(
    trx: Knex.Transaction,
    backend: Backend,
    normalized: NormalizedStatement,
    compiled: CompiledStatement,
  ): Promise<ExecutionOutcome> {
    switch (normalized.kind) {
      case 'SELECT': {
        const rows = backend.readRows(await trx.raw(compiled.sql, compiled.bindings));
        return rows.length > 0 ? { type: 'rows', rows } : { type: 'empty' };
      }

      case 'DELETE':
        return this.deleteWithDependents(trx, backend, compiled);

      default:
        return this.write(backend, await trx.raw(compiled.sql, compiled.bindings), 0);
    }
  }

  private write(backend: Backend, result: unknown, clearedDependents: number): AffectedOutcome {
    const returning = backend.readRows(result);
    const count = backend.readAffected(result) || returning.length;
    return returning.length > 0
      ? { type: 'affected', count, clearedDependents, returning }
      : { type: 'affected', count, clearedDependents };
  }

  /**
   * Delete after nulling nullable foreign keys that point at the doomed rows.
   * Runs inside the caller's transaction: if the delete still fails, the
   * null-outs roll back with it.
   *
   * Once references are cleared, the targets are deleted by the key values
   * read up front, since clearing may change what the original predicate
   * matches (a row selected through its own reference column).
   */
  private async deleteWithDependents(
    trx: Knex.Transaction,
    backend: Backend,
    compiled: CompiledStatement,
  ): Promise<AffectedOutcome> {
    const table = deleteTarget(compiled.sql);
    const runOriginal = async (cleared: number) =>
      this.write(backend, await trx.raw(compiled.sql, compiled.bindings), cleared);

    if (!this.options.clearDependents || !table) {
      return runOriginal(0);
    }
    if (hasUsingClause(compiled.sql)) {
      logger.info(`Not clearing references before delete from ${table}: statement joins other tables`);
      return runOriginal(0);
    }

    const refs = (await backend.referencingKeys(trx, table)).filter((ref) => ref.nullable);
    if (refs.length === 0) {
      return runOriginal(0);
    }

    const select = compiled.sql
      .replace(/^(\s*(?:--[^\n]*\n\s*)*)DELETE\b/i, '$1SELECT *')
      .replace(/\s+RETURNING\b[\s\S]*$/i, '');
    const targets: Row[] = backend.readRows(await trx.raw(select, compiled.bindings));

    let cleared = 0;
    for (const ref of refs) {
      const keys = keyValues(targets, ref.referencedColumn);
      if (keys.length === 0) {
        continue;
      }

      const dependents = await trx(ref.table).whereIn(ref.column, keys).select(ref.column);
      if (dependents.length > 0) {
        cleared += await trx(ref.table).whereIn(ref.column, keys).update({ [ref.column]: null });
        logger.info(`Cleared ${dependents.length} reference(s) in ${ref.table}.${ref.column} before delete from ${table}`);
      }
    }

    const key = refs[0].referencedColumn;
    const keys = keyValues(targets, key);
    if (cleared === 0 || keys.length !== targets.length) {
      return runOriginal(cleared);
    }

    const returning = /\bRETURNING\b/i.test(maskLiterals(compiled.sql).masked)
      ? await trx(table).whereIn(key, keys).select('*')
      : [];
    const count = await trx(table).whereIn(key, keys).del();
    return returning.length > 0
      ? { type: 'affected', count, clearedDependents: cleared, returning }
      : { type: 'affected', count, clearedDependents: cleared };
  }

  private async rollback(trx: Knex.Transaction): Promise<void> {
    if (trx.isCompleted()) {
      return;
    }
    try {
      await trx.rollback();
    } catch (error) {
      logger.error({ err: error }, 'Rollback failed');
    }
  }
}
