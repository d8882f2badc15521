/**
 * Connection management: one Knex pool for the active profile, rebuilt when
 * the profile changes.
 */

import { knex, type Knex } from 'knex';
import {
  ConnectionProfileSchema,
  type ConnectionProfile,
  type ConnectionProfileInput,
} from '../types/models.js';
import { ConfigurationError } from '../types/errors.js';
import { ReadWriteLock } from '../utils/lock.js';
import { logger } from '../utils/logger.js';
import { backendFor, DEFAULT_CONNECT_TIMEOUT_MS, type Backend } from './backends.js';

/**
 * A scoped handle on the active connection. Valid only inside `withSession`.
 */
export interface Session {
  db: Knex;
  backend: Backend;
  profile: ConnectionProfile;
}

export type ProfileListener = (profile: ConnectionProfile) => void;

export interface ConnectionOptions {
  /** Connect and pool-acquire timeout. */
  connectTimeoutMs?: number;
}

/**
 * Validate a caller-supplied profile and fill in the backend's default port.
 * Throws ConfigurationError; never touches the network.
 */
export function resolveProfile(input: unknown): ConnectionProfile {
  const parsed = ConnectionProfileSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid connection profile',
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'profile'}: ${issue.message}`),
    );
  }

  const backend = backendFor(parsed.data.backendKind);
  return {
    ...parsed.data,
    port: parsed.data.port ?? backend.defaultPort,
  };
}

/**
 * Profile rendered for logs, password masked.
 */
export function describeProfile(profile: ConnectionProfile): string {
  if (profile.backendKind === 'sqlite') {
    return `sqlite://${profile.database || ':memory:'}`;
  }
  const credentials = profile.user ? `${profile.user}:****@` : '';
  return `${profile.backendKind}://${credentials}${profile.host}:${profile.port}/${profile.database}`;
}

export class ConnectionManager {
  private profile: ConnectionProfile;
  private backend: Backend;
  private db: Knex | null = null;
  private readonly lock = new ReadWriteLock();
  private readonly listeners: ProfileListener[] = [];
  private readonly connectTimeoutMs: number;

  constructor(profile: ConnectionProfileInput, options: ConnectionOptions = {}) {
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.profile = resolveProfile(profile);
    this.backend = backendFor(this.profile.backendKind);
  }

  /**
   * Register a callback run after every successful profile swap.
   */
  onProfileChange(listener: ProfileListener): void {
    this.listeners.push(listener);
  }

  getProfile(): ConnectionProfile {
    return { ...this.profile };
  }

  getBackend(): Backend {
    return this.backend;
  }

  /**
   * Run `fn` with a session on the active profile.
   * Profile swaps wait until every open session has been released.
   */
  async withSession<T>(fn: (session: Session) => Promise<T>): Promise<T> {
    return this.lock.read(() =>
      fn({ db: this.connection(), backend: this.backend, profile: this.profile }),
    );
  }

  /**
   * Validate and atomically swap the active profile.
   * Listeners (catalog invalidation) are notified, then the old pool is destroyed.
   * A failed teardown is logged; the new profile stays active.
   */
  async updateProfile(input: unknown): Promise<ConnectionProfile> {
    const next = resolveProfile(input);

    await this.lock.write(async () => {
      const previous = this.db;
      this.db = null;
      this.profile = next;
      this.backend = backendFor(next.backendKind);
      for (const listener of this.listeners) {
        listener(next);
      }
      if (previous) {
        await previous.destroy().catch((error: unknown) => {
          logger.error({ err: error }, 'Failed to close the previous connection pool');
        });
      }
    });

    logger.info(`Connection profile updated: ${describeProfile(next)}`);
    return { ...next };
  }

  /**
   * Close the pool. A later session reopens it.
   */
  async close(): Promise<void> {
    await this.lock.write(async () => {
      if (this.db) {
        await this.db.destroy();
        this.db = null;
        logger.info('Database connection closed');
      }
    });
  }

  private connection(): Knex {
    if (!this.db) {
      this.db = knex(this.backend.knexConfig(this.profile, this.connectTimeoutMs));
      logger.info(`Database pool created: ${describeProfile(this.profile)}`);
    }
    return this.db;
  }
}
