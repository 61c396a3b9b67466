/**
 * Topological sort for stage descriptors and command graph rules.
 *
 * Edges run from an item to its successors. Among the items that are ready,
 * the one declared first is emitted first, so an input that is already in a
 * valid topological order comes back unchanged.
 *
 * Successors that are not in the input are reported through onUnknown
 * (the caller decides whether that is an error); they add no edge.
 */

export interface ToposortItem {
  id: string;
  successors: readonly string[];
}

/**
 * Thrown when the items do not form a DAG.
 * `cycle` starts and ends with the same id.
 */
export class CycleError extends Error {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super(`Dependency cycle detected: ${cycle.join(' -> ')}`);
    this.name = 'CycleError';
    this.cycle = cycle;
  }
}

export function toposort(
  items: readonly ToposortItem[],
  onUnknown: (from: string, to: string) => void = () => {}
): string[] {
  const index = new Map<string, number>();
  items.forEach((item, i) => index.set(item.id, i));

  const inDegree = new Array<number>(items.length).fill(0);
  const edges: number[][] = items.map(() => []);

  items.forEach((item, i) => {
    for (const successor of item.successors) {
      const j = index.get(successor);
      if (j === undefined) {
        onUnknown(item.id, successor);
        continue;
      }
      edges[i].push(j);
      inDegree[j]++;
    }
  });

  // Ready set kept sorted by declaration index
  const ready: number[] = [];
  inDegree.forEach((degree, i) => {
    if (degree === 0) ready.push(i);
  });

  const order: string[] = [];
  for (let current = ready.shift(); current !== undefined; current = ready.shift()) {
    order.push(items[current].id);
    for (const next of edges[current]) {
      inDegree[next]--;
      if (inDegree[next] === 0) insertSorted(ready, next);
    }
  }

  if (order.length < items.length) {
    throw new CycleError(findCycle(items, edges, inDegree));
  }
  return order;
}

function insertSorted(list: number[], value: number): void {
  let i = list.length;
  while (i > 0 && list[i - 1] > value) i--;
  list.splice(i, 0, value);
}

/**
 * Walk predecessor edges among the items Kahn's algorithm could not emit.
 * Every one of them still has an unemitted predecessor, so the walk must
 * revisit a node; the revisited stretch, reversed, is a cycle.
 */
function findCycle(items: readonly ToposortItem[], edges: number[][], inDegree: number[]): string[] {
  const predecessors: number[][] = items.map(() => []);
  edges.forEach((targets, from) => {
    for (const to of targets) predecessors[to].push(from);
  });

  const stuck = (i: number): boolean => inDegree[i] > 0;
  const path: number[] = [];
  const position = new Map<number, number>();

  let current = inDegree.findIndex((degree) => degree > 0);
  while (!position.has(current)) {
    position.set(current, path.length);
    path.push(current);
    const previous = predecessors[current].find(stuck);
    if (previous === undefined) break;
    current = previous;
  }

  const cycle = path.slice(position.get(current) ?? 0).reverse().map((i) => items[i].id);
  cycle.push(cycle[0]);
  return cycle;
}
