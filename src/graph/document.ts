import { readFile } from "node:fs/promises";
import { z } from "zod";

import { InvalidArgumentError, describePayload } from "../errors.js";
import { WeightedGraph, type WeightedGraphOptions } from "./weightedGraph.js";

const VertexIdSchema = z.string().trim().min(1, "vertex ids must be non-empty strings");

export const GraphEdgeDocumentSchema = z
  .object({
    source: VertexIdSchema,
    destination: VertexIdSchema,
    weight: z.number().finite("edge weights must be finite numbers"),
  })
  .strict();

/** JSON description of a graph whose vertices are identified by strings. */
export const GraphDocumentSchema = z
  .object({
    name: z.string().optional(),
    vertices: z.array(VertexIdSchema),
    edges: z.array(GraphEdgeDocumentSchema).default([]),
  })
  .strict();

export type GraphDocument = z.infer<typeof GraphDocumentSchema>;

/** Validates an untrusted value, reporting zod issues as an invalid-argument error. */
export function parseGraphDocument(input: unknown): GraphDocument {
  const result = GraphDocumentSchema.safeParse(input);
  if (!result.success) {
    const summary = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new InvalidArgumentError(`Invalid graph document: ${summary}`, {
      hint: "invalid_input",
      details: { issues: result.error.issues },
    });
  }
  return result.data;
}

/** Adds the vertices in document order, then the edges as one validated batch. */
export function buildGraphFromDocument(
  document: GraphDocument,
  options: WeightedGraphOptions = {},
): WeightedGraph<string> {
  const graph = new WeightedGraph<string>(options);
  for (const vertex of document.vertices) {
    graph.addVertex(vertex);
  }
  graph.addEdges(document.edges);
  return graph;
}

export function graphToDocument(graph: WeightedGraph<string>, name?: string): GraphDocument {
  return {
    ...(name !== undefined ? { name } : {}),
    vertices: graph.listVertices(),
    edges: graph.listEdges().map((edge) => ({ ...edge })),
  };
}

/** Reads a JSON graph document from disk. */
export async function readGraphDocument(file: string): Promise<GraphDocument> {
  let contents: string;
  try {
    contents = await readFile(file, "utf8");
  } catch (error) {
    throw new InvalidArgumentError(`Graph file '${file}' cannot be read`, {
      details: { reason: error instanceof Error ? error.message : describePayload(error) },
    });
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    throw new InvalidArgumentError(`Graph file '${file}' is not valid JSON`, {
      details: { reason: error instanceof Error ? error.message : describePayload(error) },
    });
  }
  return parseGraphDocument(parsed);
}
