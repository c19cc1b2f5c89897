import { InvalidArgumentError, describePayload } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import type { Edge } from "./edge.js";
import { Vertex, type ReadonlyVertex } from "./vertex.js";

/** Outgoing adjacency entry resolved to payloads. */
export interface OutgoingEdge<T> {
  readonly destination: T;
  readonly weight: number;
}

/**
 * Read-only surface of a weighted graph. Searches only ever receive this view
 * so they cannot mutate the graph they are bound to.
 */
export interface ReadonlyWeightedGraph<T> {
  readonly vertexCount: number;
  readonly edgeCount: number;
  hasVertex(data: T): boolean;
  getVertex(data: T): ReadonlyVertex<T> | undefined;
  indexOf(data: T): number | undefined;
  vertexAt(index: number): ReadonlyVertex<T>;
  listVertices(): T[];
  getOutgoing(data: T): OutgoingEdge<T>[];
  getWeight(source: T, destination: T): number | undefined;
  listEdges(): Edge<T>[];
  hasNegativeWeights(): boolean;
}

export interface WeightedGraphOptions {
  readonly logger?: StructuredLogger;
}

/**
 * In-memory directed graph whose vertices are keyed by payload. Payloads are
 * compared the way `Map` keys are: primitives by value, objects by identity.
 */
export class WeightedGraph<T> implements ReadonlyWeightedGraph<T> {
  private readonly vertices: Vertex<T>[] = [];
  /** Adjacency per arena index; only this class writes to it. */
  private readonly adjacency: Map<number, number>[] = [];
  private readonly indexByData = new Map<T, number>();
  private readonly logger?: StructuredLogger;

  constructor(options: WeightedGraphOptions = {}) {
    if (options.logger) {
      this.logger = options.logger.child("graph");
    }
  }

  get vertexCount(): number {
    return this.vertices.length;
  }

  get edgeCount(): number {
    let count = 0;
    for (const vertex of this.vertices) {
      count += vertex.degree;
    }
    return count;
  }

  /**
   * Inserts a vertex. Adding a payload that already exists resets that vertex:
   * its outgoing edges are dropped while edges pointing at it are kept.
   */
  addVertex(data: T): void {
    const existing = this.indexByData.get(data);
    if (existing !== undefined) {
      const outgoing = this.adjacency[existing];
      const dropped = outgoing.size;
      outgoing.clear();
      this.logger?.debug("graph_vertex_reset", { index: existing, dropped_edges: dropped });
      return;
    }
    const index = this.vertices.length;
    const outgoing = new Map<number, number>();
    this.adjacency.push(outgoing);
    this.vertices.push(new Vertex(index, data, outgoing));
    this.indexByData.set(data, index);
  }

  /**
   * Records (or overwrites) the directed edge `source -> destination`. Both
   * endpoints must exist and the weight must be finite; nothing is mutated
   * otherwise.
   */
  addEdge(source: T, destination: T, weight: number): void {
    const [from, to] = this.resolveEdge(source, destination, weight);
    this.adjacency[from].set(to, weight);
  }

  /** Inserts a batch of edges, validating all of them before touching the graph. */
  addEdges(edges: Iterable<Edge<T>>): void {
    const resolved = Array.from(edges, (edge) => ({
      endpoints: this.resolveEdge(edge.source, edge.destination, edge.weight),
      weight: edge.weight,
    }));
    for (const { endpoints, weight } of resolved) {
      this.adjacency[endpoints[0]].set(endpoints[1], weight);
    }
  }

  hasVertex(data: T): boolean {
    return this.indexByData.has(data);
  }

  getVertex(data: T): ReadonlyVertex<T> | undefined {
    const index = this.indexByData.get(data);
    return index === undefined ? undefined : this.vertices[index];
  }

  indexOf(data: T): number | undefined {
    return this.indexByData.get(data);
  }

  vertexAt(index: number): ReadonlyVertex<T> {
    const vertex = this.vertices[index];
    if (!vertex) {
      throw new RangeError(`No vertex at index ${index}`);
    }
    return vertex;
  }

  /** Payloads in insertion order. */
  listVertices(): T[] {
    return this.vertices.map((vertex) => vertex.data);
  }

  getOutgoing(data: T): OutgoingEdge<T>[] {
    const vertex = this.getVertex(data);
    if (!vertex) {
      return [];
    }
    return Array.from(vertex.neighbours(), ([target, weight]) => ({
      destination: this.vertexAt(target).data,
      weight,
    }));
  }

  getWeight(source: T, destination: T): number | undefined {
    const target = this.indexByData.get(destination);
    if (target === undefined) {
      return undefined;
    }
    return this.getVertex(source)?.weightTo(target);
  }

  /** Every edge, grouped by source in vertex insertion order. */
  listEdges(): Edge<T>[] {
    const edges: Edge<T>[] = [];
    for (const vertex of this.vertices) {
      for (const [target, weight] of vertex.neighbours()) {
        edges.push({ source: vertex.data, destination: this.vertexAt(target).data, weight });
      }
    }
    return edges;
  }

  hasNegativeWeights(): boolean {
    for (const vertex of this.vertices) {
      for (const [, weight] of vertex.neighbours()) {
        if (weight < 0) {
          return true;
        }
      }
    }
    return false;
  }

  /** Validates an edge and returns the arena indices of its endpoints. */
  private resolveEdge(source: T, destination: T, weight: number): [number, number] {
    const from = this.indexByData.get(source);
    if (from === undefined) {
      throw new InvalidArgumentError(`Unknown source vertex '${describePayload(source)}'`, {
        hint: "add the vertex before connecting it",
      });
    }
    const to = this.indexByData.get(destination);
    if (to === undefined) {
      throw new InvalidArgumentError(`Unknown destination vertex '${describePayload(destination)}'`, {
        hint: "add the vertex before connecting it",
      });
    }
    if (!Number.isFinite(weight)) {
      throw new InvalidArgumentError(`Edge weight must be a finite number but received '${String(weight)}'`, {
        details: { source: describePayload(source), destination: describePayload(destination) },
      });
    }
    return [from, to];
  }
}
