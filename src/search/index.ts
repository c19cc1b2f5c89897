import type { ReadonlyWeightedGraph } from "../graph/weightedGraph.js";
import type { PathSearchOptions } from "./base.js";
import { BreadthFirstSearch } from "./breadthFirst.js";
import { DijkstraSearch } from "./dijkstra.js";
import type { PathSearch, SearchAlgorithm } from "./types.js";

export { PathSearchBase, type PathSearchOptions, type Traversal } from "./base.js";
export { BreadthFirstSearch } from "./breadthFirst.js";
export { DijkstraSearch } from "./dijkstra.js";
export { reconstructPath } from "./path.js";
export {
  SEARCH_ALGORITHMS,
  type PathSearch,
  type SearchAlgorithm,
  type SearchOutcome,
} from "./types.js";

/** Builds the strategy named by {@link algorithm}, bound to {@link graph}. */
export function createPathSearch<T>(
  graph: ReadonlyWeightedGraph<T>,
  algorithm: SearchAlgorithm,
  options: PathSearchOptions = {},
): PathSearch<T> {
  switch (algorithm) {
    case "bfs":
      return new BreadthFirstSearch(graph, options);
    case "dijkstra":
      return new DijkstraSearch(graph, options);
  }
}
