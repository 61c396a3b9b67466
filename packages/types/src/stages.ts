/**
 * Stage Types - the capability interface every stage variant implements
 *
 * STAGE CONTRACT:
 *
 * 1. consumes/produces - declared before configuration, used by the
 *    flow graph builder to bind inputs and detect missing artifacts
 * 2. configure - pure; returns the rules the stage contributes
 */

import type { Logger } from './logging.js';
import type { Artifact, ArtifactRequirement, OptionMap, ProjectMetadata, SourceFile } from './project.js';
import type { OptionSpec } from './flows.js';
import type { RuleSpec } from './rules.js';

export interface StageContext {
  project: ProjectMetadata;
  /** Resolved options: global, then descriptor overrides, then tool options */
  options: OptionMap;
  logger: Logger;
}

export interface ConfigureContext extends StageContext {
  /** Predecessor outputs plus external files standing in for elided stages */
  inputs: readonly Artifact[];
  files: readonly SourceFile[];
}

export interface StageContribution {
  rules: RuleSpec[];
  /** Canonical physical output, e.g. `<name>.bit` */
  primaryOutput?: string;
  /** Script files the stage's templates provide. Declared as sources */
  scripts?: string[];
}

export interface StageVariant {
  readonly id: string;
  readonly description: string;
  /** Options the variant reads. Resolved values are checked against it before configure */
  readonly options: Readonly<Record<string, OptionSpec>>;
  consumes(ctx: StageContext): ArtifactRequirement[];
  produces(ctx: StageContext): Artifact[];
  configure(ctx: ConfigureContext): StageContribution;
}
