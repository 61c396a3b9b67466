/**
 * FlowGraphBuilder - binds a flow's stage descriptors to a project
 *
 * Walks the descriptors in topological order, drops elided stages, resolves
 * each stage's options and wires its inputs to the outputs of its kept
 * predecessors. An elided predecessor's output can be stood in for by a
 * project file of the same type (and name, when the consumer asks for one).
 */

import type {
  Artifact,
  ArtifactRequirement,
  FlowGraph,
  Logger,
  OptionMap,
  ProjectMetadata,
  StageContext,
  StageDescriptor,
  StageInstance,
} from '@bitforge/types';
import { FlowError } from '../errors/BitforgeError.js';
import { orderStages } from '../registry/orderStages.js';
import type { StageCatalog } from '../stages/StageCatalog.js';
import { checkOptions } from '../stages/options.js';

export interface FlowBuildConfig {
  /** Flow name, for error context */
  flow: string;
  /** Tool ids to drop (see resolveElisions) */
  elide?: readonly string[];
}

export interface FlowGraphBuilderDeps {
  catalog: StageCatalog;
  logger: Logger;
}

export function matchesRequirement(artifact: Artifact, requirement: ArtifactRequirement): boolean {
  if (artifact.fileType !== requirement.fileType) return false;
  return requirement.name === undefined || artifact.name === requirement.name;
}

/**
 * Global options, then the descriptor's overrides, then the project's
 * options for this tool. Later layers win key by key.
 */
export function resolveOptions(descriptor: StageDescriptor, project: ProjectMetadata): OptionMap {
  return {
    ...project.options,
    ...descriptor.optionOverrides,
    ...(project.toolOptions?.[descriptor.toolId] ?? {}),
  };
}

export class FlowGraphBuilder {
  constructor(private readonly deps: FlowGraphBuilderDeps) {}

  /**
   * @throws FlowError ERR_INVALID_FLOW, ERR_CYCLE_DETECTED, ERR_UNKNOWN_TOOL,
   *   ERR_MISSING_PREDECESSOR_OUTPUT; StageError ERR_INVALID_OPTION when a
   *   resolved option does not fit the variant's option table
   */
  build(descriptors: readonly StageDescriptor[], project: ProjectMetadata, config: FlowBuildConfig): FlowGraph {
    const { catalog, logger } = this.deps;
    const flow = config.flow;
    const order = orderStages(flow, descriptors);
    const byId = new Map(descriptors.map((d) => [d.toolId, d]));

    const elide = new Set(config.elide ?? []);
    for (const id of elide) {
      if (!byId.has(id)) {
        throw new FlowError(`Cannot elide "${id}": flow "${flow}" has no such stage`, 'ERR_INVALID_FLOW', {
          flow,
          stage: id,
        });
      }
    }

    const kept = order.filter((id) => !elide.has(id));
    const built = new Map<string, StageInstance>();

    for (const toolId of kept) {
      const descriptor = byId.get(toolId);
      if (!descriptor) continue;

      const variant = catalog.get(toolId, flow);
      const options = resolveOptions(descriptor, project);
      checkOptions(toolId, variant.options, options);
      const context: StageContext = { project, options, logger };

      const predecessors = kept.filter((id) => byId.get(id)?.successors.includes(toolId));
      const candidates = predecessors.flatMap((id) => built.get(id)?.outputs ?? []);
      const inputs: Artifact[] = [...candidates];

      for (const requirement of variant.consumes(context)) {
        if (candidates.some((artifact) => matchesRequirement(artifact, requirement))) continue;

        const external = project.files.filter((file) => matchesRequirement(file, requirement));
        if (external.length === 0) {
          const wanted = requirement.name ?? `a ${requirement.fileType} file`;
          const elidedFeeders = descriptors
            .filter((d) => elide.has(d.toolId) && d.successors.includes(toolId))
            .map((d) => d.toolId);
          throw new FlowError(
            `Stage "${toolId}" needs ${wanted}, which no stage produces and the project does not supply`,
            'ERR_MISSING_PREDECESSOR_OUTPUT',
            { flow, stage: toolId, artifact: requirement.name, fileType: requirement.fileType, elided: elidedFeeders },
            elidedFeeders.length > 0
              ? `Add the file to the project or keep ${elidedFeeders.join(', ')} in the flow`
              : undefined
          );
        }

        for (const file of external) {
          if (!inputs.some((artifact) => artifact.name === file.name)) {
            inputs.push({ name: file.name, fileType: file.fileType });
            logger.debug('Bound external artifact', { stage: toolId, artifact: file.name });
          }
        }
      }

      built.set(
        toolId,
        Object.freeze({
          toolId,
          variant,
          options: Object.freeze(options),
          predecessors: Object.freeze(predecessors),
          successors: Object.freeze(descriptor.successors.filter((id) => !elide.has(id))),
          inputs: Object.freeze(inputs),
          outputs: Object.freeze(variant.produces(context)),
        })
      );
    }

    if (elide.size > 0) {
      logger.debug('Elided stages', { flow, stages: [...elide] });
    }

    return Object.freeze({
      name: project.name,
      flow,
      stages: Object.freeze(kept.flatMap((id) => built.get(id) ?? [])),
      elided: Object.freeze(order.filter((id) => elide.has(id))),
    });
  }
}
