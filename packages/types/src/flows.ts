/**
 * Flow Types - descriptors held by the stage registry
 */

/**
 * Documentation and validation data for one option.
 */
export interface OptionSpec {
  type: 'string' | 'integer' | 'boolean' | 'list';
  description: string;
  /** Allowed values. Absent means any value of `type` */
  values?: readonly string[];
  default?: string;
}

/**
 * One tool stage within a flow.
 */
export interface StageDescriptor {
  /** Tag of the stage variant (e.g. 'yosys', 'ise') */
  toolId: string;
  /** Tool ids this stage's outputs feed. Empty means terminal */
  successors: readonly string[];
  /** Applied over the global options when the stage is configured */
  optionOverrides: Readonly<Record<string, unknown>>;
}

/**
 * Drops `stage` unless the value of `option` is listed in `keepWhen`.
 *
 * @example
 * { stage: 'yosys', option: 'synth', keepWhen: ['yosys'] }
 */
export interface ElisionRule {
  stage: string;
  option: string;
  keepWhen: readonly string[];
}

/**
 * How an executor drives the generated Makefile.
 * A value of `option` listed in `synthOnlyWhen` stops the build at the
 * `synth` milestone and leaves nothing to program.
 */
export interface ExecutionRule {
  option: string;
  synthOnlyWhen: readonly string[];
  /** Virtual target that programs the device */
  programTarget: string;
}

export interface FlowDefinition {
  name: string;
  description: string;
  /** Declaration order is a topological order of the stage DAG */
  stages: readonly StageDescriptor[];
  options: Readonly<Record<string, OptionSpec>>;
  elisions: readonly ElisionRule[];
  execution?: ExecutionRule;
}
