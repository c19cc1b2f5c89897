import { InternalError, PreconditionViolationError, describePayload } from "../errors.js";
import type { ReadonlyWeightedGraph } from "../graph/weightedGraph.js";
import type { StructuredLogger } from "../logger.js";
import { reconstructPath } from "./path.js";
import type { PathSearch, SearchAlgorithm, SearchOutcome } from "./types.js";

export interface PathSearchOptions {
  readonly logger?: StructuredLogger;
}

/** Index-level result produced by a concrete traversal. */
export interface Traversal {
  /** Whether the end vertex was reached. */
  readonly reached: boolean;
  readonly predecessors: ReadonlyMap<number, number>;
  readonly visitedOrder: readonly number[];
}

/**
 * Shared skeleton of the strategies: endpoint validation, path reconstruction,
 * outcome assembly and logging. Subclasses only implement {@link traverse}.
 */
export abstract class PathSearchBase<T> implements PathSearch<T> {
  abstract readonly algorithm: SearchAlgorithm;
  private readonly logger?: StructuredLogger;

  constructor(
    protected readonly graph: ReadonlyWeightedGraph<T>,
    options: PathSearchOptions = {},
  ) {
    if (options.logger) {
      this.logger = options.logger.child("search");
    }
  }

  execute(start: T, end: T): T[] | null {
    return this.search(start, end).path;
  }

  search(start: T, end: T): SearchOutcome<T> {
    const startIndex = this.requireVertex(start, "start");
    const endIndex = this.requireVertex(end, "end");
    this.checkPreconditions();

    const traversal = this.traverse(startIndex, endIndex);
    const visitedOrder = traversal.visitedOrder.map((index) => this.graph.vertexAt(index).data);
    const outcome: SearchOutcome<T> = traversal.reached
      ? this.buildOutcome(reconstructPath(traversal.predecessors, startIndex, endIndex, this.graph.vertexCount), visitedOrder)
      : { algorithm: this.algorithm, path: null, distance: null, hops: null, visitedOrder };

    this.logger?.debug("path_search_completed", {
      algorithm: this.algorithm,
      start: describePayload(start),
      end: describePayload(end),
      found: outcome.path !== null,
      hops: outcome.hops,
      distance: outcome.distance,
      visited: visitedOrder.length,
    });
    return outcome;
  }

  /** Hook for strategy-specific checks run once the endpoints are known to exist. */
  protected checkPreconditions(): void {}

  protected abstract traverse(start: number, end: number): Traversal;

  private requireVertex(data: T, role: "start" | "end"): number {
    const index = this.graph.indexOf(data);
    if (index === undefined) {
      throw new PreconditionViolationError(`Unknown ${role} vertex '${describePayload(data)}'`, {
        hint: "both endpoints must be vertices of the bound graph",
      });
    }
    return index;
  }

  private buildOutcome(indices: number[], visitedOrder: T[]): SearchOutcome<T> {
    let distance = 0;
    for (let step = 1; step < indices.length; step += 1) {
      const weight = this.graph.vertexAt(indices[step - 1]).weightTo(indices[step]);
      if (weight === undefined) {
        throw new InternalError(`Reconstructed path uses a missing edge ${indices[step - 1]} -> ${indices[step]}`, {
          details: { from: indices[step - 1], to: indices[step] },
        });
      }
      distance += weight;
    }
    return {
      algorithm: this.algorithm,
      path: indices.map((index) => this.graph.vertexAt(index).data),
      distance,
      hops: indices.length - 1,
      visitedOrder,
    };
  }
}
