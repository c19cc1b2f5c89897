import { InternalError } from "../errors.js";

/**
 * Walks the predecessor chain from {@link end} back to {@link start} and
 * returns the vertex indices in start-to-end order. The walk never takes more
 * than {@link vertexCount} steps, so a corrupted chain fails instead of
 * looping.
 */
export function reconstructPath(
  predecessors: ReadonlyMap<number, number>,
  start: number,
  end: number,
  vertexCount: number,
): number[] {
  const reversed: number[] = [end];
  let current = end;
  while (current !== start) {
    if (reversed.length > vertexCount) {
      throw new InternalError("Predecessor chain contains a cycle", { details: { start, end } });
    }
    const previous = predecessors.get(current);
    if (previous === undefined) {
      throw new InternalError(`Predecessor chain breaks at vertex index ${current}`, {
        details: { start, end },
      });
    }
    reversed.push(previous);
    current = previous;
  }
  return reversed.reverse();
}
