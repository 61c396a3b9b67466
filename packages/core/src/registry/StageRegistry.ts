/**
 * StageRegistry - static table of flows and their stage descriptors
 *
 * Contents are validated and frozen at construction; after that the
 * registry is read-only and resolve() is a pure lookup.
 */

import type { FlowDefinition, StageDescriptor } from '@bitforge/types';
import { FlowError } from '../errors/BitforgeError.js';
import { orderStages } from './orderStages.js';
import { BUILTIN_FLOWS } from '../flows/builtin.js';

export class StageRegistry {
  private readonly flows: ReadonlyMap<string, FlowDefinition>;

  constructor(definitions: readonly FlowDefinition[]) {
    const flows = new Map<string, FlowDefinition>();
    for (const definition of definitions) {
      if (flows.has(definition.name)) {
        throw new FlowError(`Flow "${definition.name}" is registered twice`, 'ERR_INVALID_FLOW', {
          flow: definition.name,
        });
      }
      validateDefinition(definition);
      flows.set(definition.name, freezeDefinition(definition));
    }
    this.flows = flows;
  }

  /**
   * Stage descriptors of a flow, in declaration (topological) order.
   *
   * @throws FlowError ERR_UNKNOWN_FLOW
   */
  resolve(flowName: string): readonly StageDescriptor[] {
    return this.getFlow(flowName).stages;
  }

  getFlow(flowName: string): FlowDefinition {
    const flow = this.flows.get(flowName);
    if (!flow) {
      throw new FlowError(
        `Unknown flow "${flowName}"`,
        'ERR_UNKNOWN_FLOW',
        { flow: flowName },
        `Known flows: ${this.listFlows().join(', ') || '(none)'}`
      );
    }
    return flow;
  }

  listFlows(): string[] {
    return [...this.flows.keys()];
  }
}

function validateDefinition(definition: FlowDefinition): void {
  const flow = definition.name;
  const order = orderStages(flow, definition.stages);

  // A valid declaration order comes back from orderStages unchanged
  definition.stages.forEach((descriptor, i) => {
    if (order[i] !== descriptor.toolId) {
      throw new FlowError(
        `Flow "${flow}" declares stage "${descriptor.toolId}" before one of its predecessors`,
        'ERR_INVALID_FLOW',
        { flow, stage: descriptor.toolId }
      );
    }
  });

  const stageIds = new Set(order);
  for (const rule of definition.elisions) {
    if (!stageIds.has(rule.stage)) {
      throw new FlowError(
        `Elision in flow "${flow}" names unknown stage "${rule.stage}"`,
        'ERR_INVALID_FLOW',
        { flow, stage: rule.stage }
      );
    }
    if (!(rule.option in definition.options)) {
      throw new FlowError(
        `Elision of "${rule.stage}" in flow "${flow}" reads undocumented option "${rule.option}"`,
        'ERR_INVALID_FLOW',
        { flow, stage: rule.stage, option: rule.option }
      );
    }
  }
}

function freezeDefinition(definition: FlowDefinition): FlowDefinition {
  return Object.freeze({
    ...definition,
    stages: Object.freeze(
      definition.stages.map((d) =>
        Object.freeze({
          toolId: d.toolId,
          successors: Object.freeze([...d.successors]),
          optionOverrides: Object.freeze({ ...d.optionOverrides }),
        })
      )
    ),
    options: Object.freeze({ ...definition.options }),
    elisions: Object.freeze(definition.elisions.map((rule) => Object.freeze({ ...rule }))),
  });
}

/** Registry of the built-in flows */
export const defaultRegistry = new StageRegistry(BUILTIN_FLOWS);
