/**
 * Parameter values from command-line flags.
 */

import { z } from 'zod';
import { ParameterValuesSchema } from '../types/models.js';
import type { BindValue, ParameterValues } from '../types/utils.js';

const ExecOptionsSchema = z.object({
  param: z
    .union([z.string(), z.array(z.union([z.string(), z.number()]))])
    .optional()
    .transform((value) => (value === undefined ? [] : Array.isArray(value) ? value.map(String) : [value])),
  values: z.string().optional(),
});

/**
 * `7` → 7, `true` → true, `null` → null; anything else stays a string.
 */
export function parseScalar(raw: string): BindValue {
  if (/^-?\d+(\.\d+)?$/.test(raw)) {
    return Number(raw);
  }
  if (raw === 'true' || raw === 'false') {
    return raw === 'true';
  }
  if (raw === 'null') {
    return null;
  }
  return raw;
}

/**
 * Values from `--values <json>` or repeated `--param name=value`.
 * `--values` wins when both are given.
 *
 * @throws Error on a malformed flag
 */
export function parseExecOptions(options: unknown): ParameterValues {
  const parsed = ExecOptionsSchema.parse(options);

  if (parsed.values !== undefined) {
    let json: unknown;
    try {
      json = JSON.parse(parsed.values);
    } catch {
      throw new Error(`--values is not valid JSON: ${parsed.values}`);
    }
    return ParameterValuesSchema.parse(json);
  }

  const values: Record<string, BindValue> = {};
  for (const pair of parsed.param) {
    const separator = pair.indexOf('=');
    if (separator <= 0) {
      throw new Error(`--param expects name=value, got '${pair}'`);
    }
    values[pair.slice(0, separator).trim()] = parseScalar(pair.slice(separator + 1));
  }
  return values;
}
