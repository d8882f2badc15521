/**
 * Core type utilities shared by the executor and the backends.
 */

/**
 * Primitive JSON values.
 */
export type JsonPrimitive = string | number | boolean | null;

/**
 * A value bound to a placeholder. Drivers accept more than JSON (dates, buffers).
 */
export type BindValue = JsonPrimitive | Date | Buffer;

/**
 * One result row as returned by the driver: column name to value, in column order.
 */
export type Row = Record<string, unknown>;

/**
 * Caller-supplied parameter values: by name, or by position.
 */
export type ParameterValues = Record<string, BindValue> | BindValue[];

/**
 * Narrow an unknown value to a plain record.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrow an unknown value to an array of records.
 */
export function isRowArray(value: unknown): value is Row[] {
	return Array.isArray(value) && value.every(isRecord);
}
