/**
 * Error classes thrown before or around statement execution.
 *
 * Failures of the statement itself are not thrown: the executor returns them
 * as tagged `failure` outcomes (see `ExecutionOutcome`).
 */

function formatWithSuggestions(message: string, suggestions: string[]): string {
  return `${message}\n\nSuggested fixes:\n${suggestions.map((s) => `  • ${s}`).join('\n')}`;
}

/**
 * Error thrown when a connection profile or setting is rejected.
 *
 * Raised before any connection attempt is made.
 *
 * Common causes:
 * - Unsupported backend kind (only mysql, postgres and sqlite are known)
 * - Non-numeric port
 */
export class ConfigurationError extends Error {
  public readonly issues: string[];
  public readonly suggestions: string[];

  constructor(message: string, issues: string[] = [], suggestions?: string[]) {
    const suggestionList = suggestions || ConfigurationError.getDefaultSuggestions();
    const detail = issues.length > 0 ? `${message}\n${issues.map((i) => `  - ${i}`).join('\n')}` : message;
    super(formatWithSuggestions(detail, suggestionList));
    this.name = 'ConfigurationError';
    this.issues = issues;
    this.suggestions = suggestionList;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }

  private static getDefaultSuggestions(): string[] {
    return [
      'Use one of the supported backend kinds: mysql, postgres, sqlite',
      'Pass the port as a number (or omit it to use the backend default)',
    ];
  }
}

/**
 * Error thrown when a use case identifier cannot be resolved in the catalog.
 */
export class NotFoundError extends Error {
  public readonly target: string;

  constructor(target: string) {
    super(`Use case '${target}' not found`);
    this.name = 'NotFoundError';
    this.target = target;
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * Error thrown when LLM API calls fail.
 *
 * Common causes:
 * - Missing, invalid or expired API key
 * - Rate limit or quota exceeded
 * - Network connectivity issues
 */
export class LLMError extends Error {
  public readonly suggestions: string[];

  constructor(message: string, suggestions?: string[]) {
    const suggestionList = suggestions || LLMError.getDefaultSuggestions();
    super(formatWithSuggestions(message, suggestionList));
    this.name = 'LLMError';
    this.suggestions = suggestionList;
    Object.setPrototypeOf(this, LLMError.prototype);
  }

  private static getDefaultSuggestions(): string[] {
    return [
      'Verify the API key for LLM_PROVIDER is set (GOOGLE_API_KEY, ANTHROPIC_API_KEY or OPENAI_API_KEY)',
      'Check API quota and rate limits with your provider',
      'Ensure network connectivity to the LLM provider',
    ];
  }
}

/**
 * Error thrown when the catalog could not be produced from the schema.
 */
export class CatalogGenerationError extends Error {
  public readonly suggestions: string[];

  constructor(message: string, suggestions?: string[]) {
    const suggestionList = suggestions || CatalogGenerationError.getDefaultSuggestions();
    super(formatWithSuggestions(message, suggestionList));
    this.name = 'CatalogGenerationError';
    this.suggestions = suggestionList;
    Object.setPrototypeOf(this, CatalogGenerationError.prototype);
  }

  private static getDefaultSuggestions(): string[] {
    return [
      'Check that the database contains tables the generator can describe',
      'Refresh the catalog to run the generation again',
    ];
  }
}

/**
 * Error thrown when the schema description could not be read from the database.
 */
export class SchemaIntrospectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SchemaIntrospectionError';
    Object.setPrototypeOf(this, SchemaIntrospectionError.prototype);
  }
}
