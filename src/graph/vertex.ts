/** Read-only view of a vertex handed out by a graph. */
export interface ReadonlyVertex<T> {
  readonly index: number;
  readonly data: T;
  weightTo(target: number): number | undefined;
  /** Outgoing `[targetIndex, weight]` pairs in edge insertion order. */
  neighbours(): Iterable<[number, number]>;
  readonly degree: number;
}

/**
 * Arena record owned by a {@link WeightedGraph}. The index is assigned on
 * first insertion and never changes, so adjacency entries pointing at it stay
 * valid when the vertex is reset.
 *
 * The adjacency map is owned by the graph; this record only reads it, so no
 * caller holding a vertex can add or drop edges behind the graph's checks.
 */
export class Vertex<T> implements ReadonlyVertex<T> {
  readonly #adjacency: ReadonlyMap<number, number>;

  constructor(
    readonly index: number,
    readonly data: T,
    adjacency: ReadonlyMap<number, number>,
  ) {
    this.#adjacency = adjacency;
  }

  weightTo(target: number): number | undefined {
    return this.#adjacency.get(target);
  }

  neighbours(): Iterable<[number, number]> {
    return this.#adjacency.entries();
  }

  get degree(): number {
    return this.#adjacency.size;
  }
}
