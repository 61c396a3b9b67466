/**
 * Flow Graph Types - the project-bound instantiation of a flow
 */

import type { Artifact, OptionMap } from './project.js';
import type { StageVariant } from './stages.js';

export interface StageInstance {
  readonly toolId: string;
  readonly variant: StageVariant;
  readonly options: OptionMap;
  readonly predecessors: readonly string[];
  /** Successor ids with elided stages removed */
  readonly successors: readonly string[];
  readonly inputs: readonly Artifact[];
  readonly outputs: readonly Artifact[];
}

export interface FlowGraph {
  /** Project name */
  readonly name: string;
  readonly flow: string;
  /** Topological order */
  readonly stages: readonly StageInstance[];
  readonly elided: readonly string[];
}
