import { createEdge } from "./edge.js";
import { WeightedGraph, type WeightedGraphOptions } from "./weightedGraph.js";

/** Five-vertex directed graph used by the CLI when no graph file is given. */
export function createSampleGraph(options: WeightedGraphOptions = {}): WeightedGraph<string> {
  const graph = new WeightedGraph<string>(options);
  for (const vertex of ["A", "B", "C", "D", "E"]) {
    graph.addVertex(vertex);
  }
  graph.addEdges([
    createEdge("A", "B", 1),
    createEdge("A", "C", 4),
    createEdge("B", "C", 2),
    createEdge("B", "D", 5),
    createEdge("C", "D", 3),
    createEdge("C", "E", 6),
    createEdge("D", "E", 1),
  ]);
  return graph;
}
