import type { Materializable, Projection } from '../types.js';

/** Applies a projection to whatever the wrapped source materializes. */
export class ProjectedSource<T, R> implements Materializable<R> {
  constructor(
    private readonly inner: Materializable<T>,
    private readonly projection: Projection<T, R>,
  ) {}

  async toArray(signal?: AbortSignal): Promise<R[]> {
    const rows = await this.inner.toArray(signal);
    return rows.map((row) => this.projection(row));
  }
}
