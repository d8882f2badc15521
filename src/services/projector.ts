/**
 * Uniform result envelope for callers.
 */

import type { ExecutionOutcome, ExecutionResult, ProjectedResult, UseCase } from '../types/models.js';

/**
 * Human summary of an outcome.
 */
export function describeOutcome(outcome: ExecutionOutcome, deleting: boolean): string {
  switch (outcome.type) {
    case 'rows':
      return `${outcome.rows.length} row(s) returned.`;
    case 'empty':
      return 'No records found.';
    case 'affected':
      if (!deleting) {
        return 'Query executed successfully.';
      }
      return outcome.clearedDependents > 0
        ? `Record deleted successfully after resolving ${outcome.clearedDependents} dependent reference(s).`
        : 'Record deleted successfully.';
    case 'failure':
      return outcome.message;
  }
}

/**
 * Wrap an execution result. Bound input columns are echoed on every outcome,
 * failures included.
 */
export function project(useCase: UseCase | null, result: ExecutionResult): ProjectedResult {
  const deleting = /^\s*(?:--[^\n]*\n\s*)*DELETE\b/i.test(result.statement);
  return {
    useCase: useCase
      ? { id: useCase.id, description: useCase.description, category: useCase.category }
      : null,
    statementExecuted: result.statement,
    boundInputColumns: { ...result.bound },
    outcome: result.outcome,
    message: describeOutcome(result.outcome, deleting),
  };
}
