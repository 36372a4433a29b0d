/**
 * Backend Registry
 *
 * Decides which backend services a call. Resolution order, first match wins:
 *
 *   1. override   the id set with setOverride()/withOverride(); a load failure
 *                 is fatal (BackendLoadError), nothing else is tried
 *   2. loaded     a backend already loaded through load() by other code, minus
 *                 reserved ids; ties go to candidate order, then to id order
 *   3. probe      each candidate in priority order; first that loads wins
 *   4. none       NoBackendAvailableError with every probe failure attached
 *
 * The result is cached until the override changes. Concurrent resolve() calls
 * share one in-flight promise; a generation counter keeps a stale resolution
 * from overwriting the state after an override change.
 */

import { BackendLoadError, NoBackendAvailableError, type ProbeFailure, toError } from '../errors.ts';
import { logger } from '../logger.ts';
import type { Backend, BackendFactory, BackendId } from './types.ts';

export interface RegistryOptions {
  factories?: Record<BackendId, BackendFactory>;
  /** Probe order for step 3 */
  candidates?: BackendId[];
  /** Ids never adopted by step 2 */
  reserved?: BackendId[];
  /** Candidates skipped by step 3 */
  disabled?: BackendId[];
  override?: BackendId | null;
}

export class Registry {
  private readonly factories = new Map<BackendId, BackendFactory>();
  private readonly loaded = new Map<BackendId, Backend>();
  private readonly loading = new Map<BackendId, Promise<Backend>>();
  private readonly candidates: BackendId[];
  private readonly reserved: Set<BackendId>;
  private readonly disabled: Set<BackendId>;
  private override: BackendId | null;
  private active: Backend | null = null;
  private pending: Promise<Backend> | null = null;
  private generation = 0;

  constructor(options: RegistryOptions = {}) {
    const factories = options.factories ?? {};
    for (const id of Object.keys(factories)) this.factories.set(id, factories[id]);
    this.candidates = (options.candidates ?? []).slice();
    this.reserved = new Set(options.reserved ?? []);
    this.disabled = new Set(options.disabled ?? []);
    this.override = options.override ?? null;
  }

  /**
   * Register (or replace) the factory for an id. Does not load it.
   */
  define(id: BackendId, factory: BackendFactory): void {
    this.factories.set(id, factory);
  }

  /**
   * Append an id to the probe list
   */
  addCandidate(id: BackendId): void {
    if (this.candidates.indexOf(id) < 0) this.candidates.push(id);
  }

  has(id: BackendId): boolean {
    return this.factories.has(id);
  }

  isLoaded(id: BackendId): boolean {
    return this.loaded.has(id);
  }

  listLoaded(): BackendId[] {
    return Array.from(this.loaded.keys());
  }

  getCandidates(): BackendId[] {
    return this.candidates.slice();
  }

  /**
   * Load a backend by id, instantiating it on first use. Rejects with
   * BackendLoadError for an unknown id or a failing factory; failures are not
   * cached, so a later attempt retries.
   */
  load(id: BackendId): Promise<Backend> {
    const existing = this.loaded.get(id);
    if (existing) return Promise.resolve(existing);
    const inFlight = this.loading.get(id);
    if (inFlight) return inFlight;

    const factory = this.factories.get(id);
    if (!factory) return Promise.reject(new BackendLoadError(id, new Error('no such backend is registered')));

    const attempt = (async () => {
      try {
        const backend = await factory();
        this.loaded.set(id, backend);
        return backend;
      } catch (err) {
        throw new BackendLoadError(id, err);
      } finally {
        this.loading.delete(id);
      }
    })();
    this.loading.set(id, attempt);
    return attempt;
  }

  getOverride(): BackendId | null {
    return this.override;
  }

  /**
   * Force a backend for subsequent calls (null clears). Takes effect on the
   * next resolve().
   */
  setOverride(id: BackendId | null): void {
    if (id === this.override) return;
    this.override = id;
    this.active = null;
    this.pending = null;
    this.generation++;
  }

  /**
   * Run fn with a temporary override, restoring the previous one afterwards
   * even when fn throws. Overlapping scopes from concurrent callers share the
   * same state, so nest them rather than interleave them.
   */
  async withOverride<T>(id: BackendId | null, fn: () => T | Promise<T>): Promise<T> {
    const previous = this.override;
    const previousActive = this.active;
    this.setOverride(id);
    try {
      return await fn();
    } finally {
      if (this.override !== previous) {
        this.setOverride(previous);
        this.active = previousActive;
      }
    }
  }

  /** Cached backend id, without triggering resolution */
  current(): BackendId | null {
    return this.active ? this.active.id : null;
  }

  resolve(): Promise<Backend> {
    if (this.active) return Promise.resolve(this.active);
    if (this.pending) return this.pending;

    const generation = this.generation;
    const pending = this.discover().then(
      (backend) => {
        if (generation === this.generation) {
          this.active = backend;
          this.pending = null;
        }
        return backend;
      },
      (err: unknown) => {
        if (generation === this.generation) this.pending = null;
        throw err;
      }
    );
    this.pending = pending;
    return pending;
  }

  async which(): Promise<BackendId> {
    return (await this.resolve()).id;
  }

  private adoptLoaded(): Backend | null {
    const eligible = this.listLoaded().filter((id) => !this.reserved.has(id));
    if (!eligible.length) return null;

    const rank = (id: BackendId) => {
      const index = this.candidates.indexOf(id);
      return index < 0 ? this.candidates.length : index;
    };
    eligible.sort((a, b) => rank(a) - rank(b) || (a < b ? -1 : a > b ? 1 : 0));
    return this.loaded.get(eligible[0]) ?? null;
  }

  private async discover(): Promise<Backend> {
    if (this.override !== null) {
      const backend = await this.load(this.override);
      logger.info(`using backend ${backend.id} (override)`);
      return backend;
    }

    const adopted = this.adoptLoaded();
    if (adopted) {
      logger.info(`using backend ${adopted.id} (already loaded)`);
      return adopted;
    }

    const failures: ProbeFailure[] = [];
    for (let i = 0; i < this.candidates.length; i++) {
      const id = this.candidates[i];
      if (this.disabled.has(id)) {
        logger.debug(`skipping backend ${id} (disabled)`);
        continue;
      }
      try {
        const backend = await this.load(id);
        logger.info(`using backend ${backend.id}`);
        return backend;
      } catch (err) {
        const error = toError(err);
        logger.debug(`backend ${id} unavailable: ${error.message}`);
        failures.push({ backend: id, error });
      }
    }

    throw new NoBackendAvailableError(failures);
  }
}
