/**
 * Process-wide use-case catalog.
 *
 * Built lazily from the generator, at most once per invalidation epoch.
 * Concurrent first-access callers share one build.
 */

import { randomUUID } from 'crypto';
import {
  CATEGORIES,
  CATEGORY_BY_KIND,
  type BackendKind,
  type Catalog,
  type Category,
  type UseCase,
  type UseCaseDraft,
} from '../types/models.js';
import { logger } from '../utils/logger.js';
import { normalize } from './normalizer.js';

export const DEFAULT_MAX_PER_CATEGORY = 5;

/**
 * Turn generator drafts into catalog entries.
 *
 * Drafts with an unrecognised leading keyword, or a placeholder the draft does
 * not declare, are dropped. Each category keeps at most `maxPerCategory`
 * entries, in generation order.
 */
export function assembleCatalog(
  drafts: UseCaseDraft[],
  backendKind: BackendKind,
  maxPerCategory: number = DEFAULT_MAX_PER_CATEGORY,
): Catalog {
  const counts = new Map<Category, number>(CATEGORIES.map((category) => [category, 0]));
  const useCases: UseCase[] = [];

  for (const draft of drafts) {
    const normalized = normalize(draft.query);
    if (!normalized.kind) {
      logger.warn(`Dropping use case '${draft.use_case}': unrecognised statement`);
      continue;
    }

    const declared = Object.keys(draft.user_input_columns);
    const undeclared = normalized.placeholders.filter((name) => !declared.includes(name));
    if (undeclared.length > 0) {
      logger.warn(`Dropping use case '${draft.use_case}': undeclared placeholder(s) ${undeclared.join(', ')}`);
      continue;
    }

    const category = CATEGORY_BY_KIND[normalized.kind];
    const count = counts.get(category) ?? 0;
    if (count >= maxPerCategory) {
      continue;
    }
    counts.set(category, count + 1);

    useCases.push({
      id: randomUUID(),
      description: draft.use_case,
      category,
      template: normalized.text,
      inputParameters: Object.entries(draft.user_input_columns).map(([name, type]) => ({ name, type })),
      inputColumns: normalized.inputColumns,
      affectedColumns: draft.affected_columns,
    });
  }

  return { useCases, backendKind, generatedAt: new Date() };
}

/**
 * Single-flight holder for the current catalog.
 */
export class CatalogCache {
  private catalog: Catalog | null = null;
  private inflight: Promise<Catalog> | null = null;
  private epoch = 0;

  constructor(private build: () => Promise<Catalog>) {}

  /**
   * Current catalog, building it if needed. A build that started before an
   * `invalidate()` is returned to its callers but not kept.
   */
  async getOrBuild(): Promise<Catalog> {
    if (this.catalog) {
      return this.catalog;
    }
    if (this.inflight) {
      return this.inflight;
    }

    const epoch = this.epoch;
    const pending = this.build()
      .then((catalog) => {
        if (this.epoch === epoch) {
          this.catalog = catalog;
          logger.info(`Catalog built with ${catalog.useCases.length} use case(s)`);
        }
        return catalog;
      })
      .finally(() => {
        if (this.inflight === pending) {
          this.inflight = null;
        }
      });

    this.inflight = pending;
    return pending;
  }

  invalidate(): void {
    this.epoch += 1;
    this.catalog = null;
    this.inflight = null;
    logger.info('Catalog invalidated');
  }

  peek(): Catalog | null {
    return this.catalog;
  }
}
