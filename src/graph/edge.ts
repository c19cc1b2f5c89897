/**
 * Directed weighted connection used to hand edges to a graph or to read them
 * back. The graph itself stores adjacency entries, not these values.
 */
export interface Edge<T> {
  readonly source: T;
  readonly destination: T;
  readonly weight: number;
}

export function createEdge<T>(source: T, destination: T, weight: number): Edge<T> {
  return { source, destination, weight };
}
