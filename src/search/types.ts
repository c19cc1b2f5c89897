/** Literals naming the available search strategies. */
export const SEARCH_ALGORITHMS = ["bfs", "dijkstra"] as const;

export type SearchAlgorithm = (typeof SEARCH_ALGORITHMS)[number];

/** Detailed result of a single path query. */
export interface SearchOutcome<T> {
  readonly algorithm: SearchAlgorithm;
  /** Ordered payloads from start to end (both included), or `null` when unreachable. */
  readonly path: T[] | null;
  /** Sum of the edge weights along {@link path}. */
  readonly distance: number | null;
  /** Number of edges along {@link path}. */
  readonly hops: number | null;
  /** Vertices in the order the strategy expanded them. */
  readonly visitedOrder: T[];
}

/** Shortest-path strategy bound to one graph. */
export interface PathSearch<T> {
  readonly algorithm: SearchAlgorithm;
  /** Returns the path from {@link start} to {@link end}, or `null` when none exists. */
  execute(start: T, end: T): T[] | null;
  search(start: T, end: T): SearchOutcome<T>;
}
