/**
 * Rule Types - units of build work accumulated into the command graph
 */

/**
 * A rule as a stage contributes it.
 */
export interface RuleSpec {
  /** Argument vector. Empty for grouping rules */
  command: readonly string[];
  /** Non-empty */
  targets: readonly string[];
  dependencies: readonly string[];
  /** All targets are virtual (no file is written) */
  phony?: boolean;
}

/**
 * A rule as the command graph stores it.
 */
export interface Rule {
  readonly command: readonly string[];
  readonly targets: readonly string[];
  /** Deduplicated, first occurrence wins */
  readonly dependencies: readonly string[];
  readonly phony: boolean;
}

export type CommandGraphState = 'open' | 'finalized';

/**
 * How the external executor builds or programs a configured work root.
 */
export interface ExecutorCommand {
  command: string;
  args: string[];
  cwd: string;
}

export interface ExecutionPlan {
  build: ExecutorCommand;
  /** null when the flow stops before a bitstream exists */
  run: ExecutorCommand | null;
}
