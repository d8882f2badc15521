/**
 * Type definitions and Zod schemas for type-safe data validation.
 */

import { z } from 'zod';
import type { BackendKind } from '../config.js';
import type { BindValue, Row } from './utils.js';

export type { BackendKind } from '../config.js';

// ============================================================================
// USE CASES AND CATALOG
// ============================================================================

export const CATEGORIES = ['Create', 'Read', 'Update', 'Delete'] as const;

export type Category = (typeof CATEGORIES)[number];

/**
 * Leading statement keyword of a recognised template.
 */
export type StatementKind = 'INSERT' | 'SELECT' | 'UPDATE' | 'DELETE';

export const CATEGORY_BY_KIND: Record<StatementKind, Category> = {
	INSERT: 'Create',
	SELECT: 'Read',
	UPDATE: 'Update',
	DELETE: 'Delete',
};

/**
 * A declared input parameter. Order is the order the generator declared them.
 */
export interface InputParameter {
	name: string;
	type: string;
}

export interface UseCase {
	id: string;
	description: string;
	category: Category;
	template: string;
	inputParameters: InputParameter[];
	/** Columns the template takes user input for, as extracted from its text. */
	inputColumns: string[];
	/** Columns the generator reported as read or written. */
	affectedColumns: string[];
}

export interface Catalog {
	useCases: UseCase[];
	backendKind: BackendKind;
	generatedAt: Date;
}

/**
 * Shape the LLM is asked to return for each use case.
 */
export const UseCaseDraftSchema = z.object({
	use_case: z.string().describe('Short business description of the use case'),
	query: z.string().describe('Parameterized SQL statement using :param_name placeholders'),
	affected_columns: z.array(z.string()).describe('Columns read or written by the statement'),
	user_input_columns: z
		.record(z.string())
		.describe('Placeholder name to SQL data type, in placeholder order'),
});
export type UseCaseDraft = z.infer<typeof UseCaseDraftSchema>;

export const UseCaseDraftListSchema = z.object({
	use_cases: z.array(UseCaseDraftSchema),
});

// ============================================================================
// CONNECTION PROFILE
// ============================================================================

export interface ConnectionProfile {
	backendKind: BackendKind;
	host: string;
	port?: number;
	database: string;
	user: string;
	password: string;
}

const PortNumberSchema = z
	.number()
	.int()
	.min(1, 'port must be between 1 and 65535')
	.max(65535, 'port must be between 1 and 65535');

/**
 * Profile as accepted from callers: the port may arrive as a numeric string.
 */
export const ConnectionProfileSchema = z.object({
	backendKind: z.enum(['mysql', 'postgres', 'sqlite'], {
		errorMap: () => ({ message: 'backendKind must be one of mysql, postgres, sqlite' }),
	}),
	host: z.string().default('localhost'),
	port: z
		.union([
			PortNumberSchema,
			z
				.string()
				.regex(/^\d+$/, 'port must be numeric')
				.transform((value) => Number(value))
				.pipe(PortNumberSchema),
		])
		.optional(),
	database: z.string().default(''),
	user: z.string().default(''),
	password: z.string().default(''),
});
export type ConnectionProfileInput = z.input<typeof ConnectionProfileSchema>;

// ============================================================================
// EXECUTION OUTCOMES (discriminated union)
// ============================================================================

export type FailureKind =
	| 'constraint_violation'
	| 'syntax_defect'
	| 'operational'
	| 'connection'
	| 'unknown';

export interface RowsOutcome {
	readonly type: 'rows';
	readonly rows: Row[];
}

/**
 * A SELECT that matched nothing. Distinct from a failure.
 */
export interface EmptyOutcome {
	readonly type: 'empty';
}

export interface AffectedOutcome {
	readonly type: 'affected';
	readonly count: number;
	/** Rows whose foreign key was nulled before a delete. */
	readonly clearedDependents: number;
	/** Rows handed back by a RETURNING clause, where the backend yields them. */
	readonly returning?: Row[];
}

export interface FailureOutcome {
	readonly type: 'failure';
	readonly kind: FailureKind;
	readonly message: string;
	readonly suggestedFix?: string;
}

export type ExecutionOutcome = RowsOutcome | EmptyOutcome | AffectedOutcome | FailureOutcome;

/**
 * What the executor hands back: the statement as run, what was bound, and the outcome.
 */
export interface ExecutionResult {
	statement: string;
	bound: Record<string, BindValue>;
	outcome: ExecutionOutcome;
}

/**
 * Uniform envelope returned to callers.
 */
export interface ProjectedResult {
	useCase: { id: string; description: string; category: Category } | null;
	statementExecuted: string;
	boundInputColumns: Record<string, BindValue>;
	outcome: ExecutionOutcome;
	message: string;
}

// ============================================================================
// REQUEST BODIES
// ============================================================================

const BindValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const ParameterValuesSchema = z.union([
	z.record(BindValueSchema),
	z.array(BindValueSchema),
]);

/**
 * Request model for executing a catalog use case.
 */
export const ExecuteUseCaseRequestSchema = z.object({
	use_case: z.string().min(1).describe('Use case id or description'),
	user_inputs: ParameterValuesSchema.default({}).describe('Values by name or by position'),
});
export type ExecuteUseCaseRequest = z.infer<typeof ExecuteUseCaseRequestSchema>;

/**
 * Request model for executing a raw template.
 */
export const UpdateDataRequestSchema = z.object({
	use_case: z.string().optional(),
	query: z.string().min(1),
	params: ParameterValuesSchema.default([]),
});
export type UpdateDataRequest = z.infer<typeof UpdateDataRequestSchema>;

export const DraftQueryRequestSchema = z.object({
	use_case: z.string().min(1).max(500),
});
export type DraftQueryRequest = z.infer<typeof DraftQueryRequestSchema>;
