/**
 * Main entry point for programmatic use: catalog, execution and connection
 * profile behind one object.
 *
 * @example
 * ```typescript
 * const engine = new QueryEngine({
 *   connection: { backendKind: 'postgres', host: 'localhost', database: 'shop', user: 'app', password: 'test-secret' },
 *   llm: { provider: 'anthropic', model: 'claude-sonnet-4-5-20250929', apiKey: process.env.ANTHROPIC_API_KEY },
 * });
 *
 * const catalog = await engine.listCatalog();
 * const result = await engine.execute(catalog.useCases[0].id, { id: 7 });
 * ```
 */

import type { BackendKind } from './config.js';
import { CatalogGenerationError, NotFoundError } from './types/errors.js';
import type {
  Catalog,
  ConnectionProfile,
  ConnectionProfileInput,
  ProjectedResult,
  UseCase,
} from './types/models.js';
import type { ParameterValues } from './types/utils.js';
import { logger } from './utils/logger.js';
import { assembleCatalog, CatalogCache, DEFAULT_MAX_PER_CATEGORY } from './services/catalog.js';
import { ConnectionManager, describeProfile } from './services/connection.js';
import { QueryExecutor } from './services/executor.js';
import { CatalogGenerator, type GenerationContext } from './services/generator.js';
import { SchemaIntrospector } from './services/introspector.js';
import { LLMService, type LLMConfig } from './services/llm.js';
import { statementKind } from './services/normalizer.js';
import { project } from './services/projector.js';

export interface QueryEngineConfig {
  connection: ConnectionProfileInput;
  llm: LLMConfig;
  /** Null out nullable references before deletes. Default true. */
  clearDependents?: boolean;
  maxPerCategory?: number;
  connectTimeoutMs?: number;
}

/**
 * What to execute: a catalog entry (by id or description) or a raw template.
 */
export type ExecutionTarget = string | { useCaseId: string } | { template: string };

/**
 * Collaborators the engine is built from. Tests replace the schema source and
 * the generator.
 */
export interface EngineServices {
  introspector?: Pick<SchemaIntrospector, 'getSchema'>;
  generator?: Pick<CatalogGenerator, 'generate' | 'generateQuery'>;
}

export class QueryEngine {
  readonly connections: ConnectionManager;
  private readonly executor: QueryExecutor;
  private readonly introspector: Pick<SchemaIntrospector, 'getSchema'>;
  private readonly generator: Pick<CatalogGenerator, 'generate' | 'generateQuery'>;
  private readonly catalog: CatalogCache;
  private readonly maxPerCategory: number;

  constructor(config: QueryEngineConfig, services: EngineServices = {}) {
    this.maxPerCategory = config.maxPerCategory ?? DEFAULT_MAX_PER_CATEGORY;
    this.connections = new ConnectionManager(config.connection, {
      connectTimeoutMs: config.connectTimeoutMs,
    });
    this.executor = new QueryExecutor(this.connections, {
      clearDependents: config.clearDependents ?? true,
    });
    this.introspector = services.introspector ?? new SchemaIntrospector(this.connections);
    this.generator =
      services.generator ?? new CatalogGenerator(new LLMService(config.llm), this.maxPerCategory);
    this.catalog = new CatalogCache(() => this.buildCatalog());

    this.connections.onProfileChange(() => this.catalog.invalidate());
  }

  /**
   * Current catalog; regenerated on first access after an invalidation.
   */
  async listCatalog(): Promise<Catalog> {
    return this.catalog.getOrBuild();
  }

  /**
   * Drop the cached catalog. The next `listCatalog()` regenerates it.
   */
  refreshCatalog(): void {
    this.catalog.invalidate();
  }

  /**
   * Look up a use case by id, or by exact description.
   *
   * @throws NotFoundError
   */
  async getUseCase(idOrDescription: string): Promise<UseCase> {
    const { useCases } = await this.listCatalog();
    const found =
      useCases.find((useCase) => useCase.id === idOrDescription) ??
      useCases.find((useCase) => useCase.description === idOrDescription);
    if (!found) {
      throw new NotFoundError(idOrDescription);
    }
    return found;
  }

  /**
   * Bind and run a use case or raw template.
   *
   * A string naming an entry of the current catalog runs that entry. Otherwise a
   * string starting with INSERT, SELECT, UPDATE or DELETE is run as a template,
   * and anything else is looked up in the (possibly regenerated) catalog.
   *
   * @throws NotFoundError for an unknown use case
   */
  async execute(target: ExecutionTarget, values: ParameterValues = {}): Promise<ProjectedResult> {
    if (typeof target === 'string') {
      const cached = this.catalog.peek()?.useCases.find(
        (useCase) => useCase.id === target || useCase.description === target,
      );
      if (cached) {
        return this.executeUseCase(cached, values);
      }
      return statementKind(target) === null
        ? this.executeUseCase(await this.getUseCase(target), values)
        : this.executeTemplate(target, values);
    }
    if ('useCaseId' in target) {
      return this.executeUseCase(await this.getUseCase(target.useCaseId), values);
    }
    return this.executeTemplate(target.template, values);
  }

  /**
   * Validate and swap the connection profile. The catalog is invalidated.
   *
   * @throws ConfigurationError before any connection attempt
   */
  async updateConnectionProfile(profile: unknown): Promise<{ message: string; profile: string }> {
    const next = await this.connections.updateProfile(profile);
    return { message: 'Database connection updated successfully', profile: describeProfile(next) };
  }

  getConnectionProfile(): ConnectionProfile {
    return this.connections.getProfile();
  }

  get backendKind(): BackendKind {
    return this.connections.getBackend().kind;
  }

  /**
   * Ask the generator for one ad-hoc use case. It is not added to the catalog.
   */
  async draftQuery(description: string): Promise<UseCase> {
    const draft = await this.generator.generateQuery(description, await this.generationContext());
    const [useCase] = assembleCatalog([draft], this.backendKind).useCases;
    if (!useCase) {
      throw new CatalogGenerationError(`The drafted statement is not a data operation: ${draft.query}`);
    }
    return useCase;
  }

  /**
   * Schema description of the active connection.
   */
  async describeSchema(): Promise<string> {
    return this.introspector.getSchema();
  }

  async close(): Promise<void> {
    await this.connections.close();
  }

  private async executeUseCase(useCase: UseCase, values: ParameterValues): Promise<ProjectedResult> {
    const result = await this.executor.execute({
      template: useCase.template,
      parameters: useCase.inputParameters,
      values,
    });
    return project(useCase, result);
  }

  private async executeTemplate(template: string, values: ParameterValues): Promise<ProjectedResult> {
    return project(null, await this.executor.execute({ template, values }));
  }

  private async generationContext(): Promise<GenerationContext> {
    const backend = this.connections.getBackend();
    return {
      schema: await this.introspector.getSchema(),
      backendKind: backend.kind,
      dialectHints: backend.dialectHints,
    };
  }

  private async buildCatalog(): Promise<Catalog> {
    const context = await this.generationContext();
    logger.info(`Building catalog for ${describeProfile(this.connections.getProfile())}`);
    const drafts = await this.generator.generate(context);
    return assembleCatalog(drafts, context.backendKind, this.maxPerCategory);
  }
}
