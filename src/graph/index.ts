export { createEdge, type Edge } from "./edge.js";
export type { ReadonlyVertex } from "./vertex.js";
export {
  WeightedGraph,
  type OutgoingEdge,
  type ReadonlyWeightedGraph,
  type WeightedGraphOptions,
} from "./weightedGraph.js";
export {
  GraphDocumentSchema,
  GraphEdgeDocumentSchema,
  buildGraphFromDocument,
  graphToDocument,
  parseGraphDocument,
  readGraphDocument,
  type GraphDocument,
} from "./document.js";
export { createSampleGraph } from "./sample.js";
