/**
 * Topological ordering of a flow's stage descriptors.
 */

import type { StageDescriptor } from '@bitforge/types';
import { toposort, CycleError } from '../core/toposort.js';
import { FlowError } from '../errors/BitforgeError.js';

/**
 * Return the descriptors' tool ids in topological order (declaration order
 * wins among independent stages).
 *
 * @throws FlowError ERR_INVALID_FLOW on a duplicate tool id or a successor
 *   outside the flow, ERR_CYCLE_DETECTED when the descriptors are not a DAG
 */
export function orderStages(flow: string, descriptors: readonly StageDescriptor[]): string[] {
  const seen = new Set<string>();
  for (const descriptor of descriptors) {
    if (seen.has(descriptor.toolId)) {
      throw new FlowError(
        `Flow "${flow}" declares stage "${descriptor.toolId}" twice`,
        'ERR_INVALID_FLOW',
        { flow, stage: descriptor.toolId }
      );
    }
    seen.add(descriptor.toolId);
  }

  try {
    return toposort(
      descriptors.map((d) => ({ id: d.toolId, successors: d.successors })),
      (from, to) => {
        throw new FlowError(
          `Stage "${from}" in flow "${flow}" feeds unknown stage "${to}"`,
          'ERR_INVALID_FLOW',
          { flow, stage: from, successor: to }
        );
      }
    );
  } catch (error) {
    if (error instanceof CycleError) {
      throw new FlowError(
        `Flow "${flow}" is not acyclic: ${error.cycle.join(' -> ')}`,
        'ERR_CYCLE_DETECTED',
        { flow, cycle: error.cycle }
      );
    }
    throw error;
  }
}
