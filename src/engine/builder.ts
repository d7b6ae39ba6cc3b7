import { QueryStateError } from '../errors.js';
import type { QueryParams } from '../query/params.js';
import type { FieldRegistry } from '../query/registry.js';
import type { ApplyInclude, PagedResult, Projection, QueryableSource } from '../types.js';
import { executeQuery } from './pipeline.js';
import type { QueryOptions } from './pipeline.js';

export type BuilderState = 'unconfigured' | 'configured' | 'executed';

export type BuilderAction = 'configure' | 'execute';

export type Transition =
  | { ok: true; next: BuilderState }
  | { ok: false; error: QueryStateError };

/** Lifecycle of a QueryBuilder. Once executed, nothing else is allowed. */
export function transition(state: BuilderState, action: BuilderAction): Transition {
  if (state === 'executed') {
    const attempted = action === 'execute' ? 'execute it again' : 'reconfigure it';
    return {
      ok: false,
      error: new QueryStateError('already_executed', `QueryBuilder has already executed; cannot ${attempted}`),
    };
  }
  return { ok: true, next: action === 'execute' ? 'executed' : 'configured' };
}

/**
 * Single-use configuration object for one search. Configure the source,
 * params and registry (projection, include applier and options are
 * optional), then execute exactly once.
 *
 * @example
 * const page = await QueryBuilder.projecting(toSummary)
 *   .withSource(customers)
 *   .withParams(bindQueryParams(request.query))
 *   .withRegistry(customerRegistry)
 *   .execute();
 */
export class QueryBuilder<T, R> {
  private state: BuilderState = 'unconfigured';
  private source: QueryableSource<T> | undefined;
  private params: QueryParams | undefined;
  private registry: FieldRegistry<T> | undefined;
  private applyInclude: ApplyInclude<T> | undefined;
  private options: QueryOptions | undefined;

  private constructor(private projection: Projection<T, R>) {}

  /** A builder that returns the entities themselves. */
  static create<T>(): QueryBuilder<T, T> {
    return new QueryBuilder<T, T>((entity) => entity);
  }

  static projecting<T, R>(projection: Projection<T, R>): QueryBuilder<T, R> {
    return new QueryBuilder(projection);
  }

  get currentState(): BuilderState {
    return this.state;
  }

  private configure(): void {
    const step = transition(this.state, 'configure');
    if (!step.ok) throw step.error;
    this.state = step.next;
  }

  withSource(source: QueryableSource<T>): this {
    this.configure();
    this.source = source;
    return this;
  }

  withParams(params: QueryParams): this {
    this.configure();
    this.params = params;
    return this;
  }

  withRegistry(registry: FieldRegistry<T>): this {
    this.configure();
    this.registry = registry;
    return this;
  }

  withProjection(projection: Projection<T, R>): this {
    this.configure();
    this.projection = projection;
    return this;
  }

  withIncludes(apply: ApplyInclude<T>): this {
    this.configure();
    this.applyInclude = apply;
    return this;
  }

  withOptions(options: QueryOptions): this {
    this.configure();
    this.options = options;
    return this;
  }

  /**
   * Runs the search. The builder is consumed by the first call, including
   * one that fails for missing configuration.
   */
  async execute(signal?: AbortSignal): Promise<PagedResult<R>> {
    const step = transition(this.state, 'execute');
    if (!step.ok) throw step.error;
    this.state = step.next;

    const { source, params, registry } = this;
    if (source === undefined || params === undefined || registry === undefined) {
      const missing = [
        source === undefined ? 'source' : null,
        params === undefined ? 'params' : null,
        registry === undefined ? 'registry' : null,
      ].filter((name): name is string => name !== null);
      throw new QueryStateError('missing_configuration', `QueryBuilder is missing: ${missing.join(', ')}`);
    }

    return executeQuery({
      source,
      params,
      registry,
      projection: this.projection,
      applyInclude: this.applyInclude,
      options: this.options,
      signal,
    });
  }
}
