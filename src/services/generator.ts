/**
 * Use-case generation from a schema description.
 */

import {
  UseCaseDraftListSchema,
  UseCaseDraftSchema,
  type BackendKind,
  type UseCaseDraft,
} from '../types/models.js';
import { CatalogGenerationError, LLMError } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import type { LLMService } from './llm.js';

const DDL_REQUEST = /\b(create|alter|drop|truncate|rename)\s+(table|index|view|schema|database|constraint)\b|\badd\s+(column|constraint|index)\b/i;

export const DDL_REJECTION =
  'This request involves database structure changes (DDL operations), which are not allowed. ' +
  'Please provide a use case for manipulating business data within existing tables.';

/**
 * System prompt for the full catalog pass.
 */
const CATALOG_SYSTEM_PROMPT = `You are an expert SQL query generator specializing in business database operations.
Given a database schema, generate EXACTLY {total} business-relevant use cases:
- {count} for Creating data (INSERT queries), adding new business records
- {count} for Reading data (SELECT queries), business insights and reporting
- {count} for Updating data (UPDATE queries), keeping business data accurate
- {count} for Deleting data (DELETE queries), data cleanup and compliance

Schema:
{schema}

Instructions:
- Write queries for real-world business scenarios, joining related entities where it helps.
- Identify which columns require user input.
- Use named placeholders (:param_name) instead of raw values, and list every placeholder in user_input_columns with its SQL type.
- Generate use cases that manipulate DATA only. Never create, alter or drop tables, indexes or constraints.
- Only use tables and columns from the schema above.
- {dialect}`;

/**
 * System prompt for drafting one query from a description.
 */
const DRAFT_SYSTEM_PROMPT = `You are an expert SQL query generator specializing in business database operations.
Given a use case and a database schema, generate the SQL statement for it.

Schema:
{schema}

Instructions:
- Generate only DML statements (INSERT, SELECT, UPDATE, DELETE) over existing tables.
- "Add employee" means INSERT into the employee table; "add employee table" is a structure change and not allowed.
- Use named placeholders (:param_name) and list every placeholder in user_input_columns with its SQL type.
- {dialect}`;

function fill(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}

export interface GenerationContext {
  schema: string;
  backendKind: BackendKind;
  dialectHints: string;
}

/**
 * Asks the LLM for use-case drafts. Output is structurally validated by the
 * catalog, not here.
 */
export class CatalogGenerator {
  constructor(
    private llm: Pick<LLMService, 'callStructured'>,
    private perCategory: number = 5,
  ) {}

  /**
   * Draft the full Create/Read/Update/Delete set for a schema.
   *
   * @throws CatalogGenerationError when the schema is empty or the LLM call fails
   */
  async generate(context: GenerationContext): Promise<UseCaseDraft[]> {
    if (!context.schema.trim()) {
      throw new CatalogGenerationError('Schema description is empty; nothing to generate use cases from');
    }

    const system = fill(CATALOG_SYSTEM_PROMPT, {
      total: String(this.perCategory * 4),
      count: String(this.perCategory),
      schema: context.schema,
      dialect: context.dialectHints,
    });

    logger.info(`Generating use-case catalog for ${context.backendKind}`);

    try {
      const result = await this.llm.callStructured(
        'Generate SQL queries for real-world business use cases categorized into Create, Read, Update, and Delete operations.',
        system,
        UseCaseDraftListSchema,
      );
      logger.info(`Generator returned ${result.use_cases.length} draft(s)`);
      return result.use_cases;
    } catch (error) {
      if (error instanceof LLMError) {
        throw new CatalogGenerationError(`Failed to generate use cases: ${error.message}`);
      }
      throw error;
    }
  }

  /**
   * Draft one use case from a business description. Structure changes are refused.
   */
  async generateQuery(description: string, context: GenerationContext): Promise<UseCaseDraft> {
    if (DDL_REQUEST.test(description)) {
      throw new CatalogGenerationError(DDL_REJECTION, [
        'Describe an operation on existing data, e.g. "add a new employee"',
      ]);
    }

    const system = fill(DRAFT_SYSTEM_PROMPT, {
      schema: context.schema,
      dialect: context.dialectHints,
    });

    return this.llm.callStructured(
      `Generate an SQL query for the following business operation: ${description}`,
      system,
      UseCaseDraftSchema,
    );
  }
}
