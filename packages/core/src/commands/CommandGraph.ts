/**
 * CommandGraph - accumulates build rules and writes them as a Makefile
 *
 * Every add() is checked against an index from target id to the rule that
 * declared it, so a conflict fails at the offending call. States:
 *
 *   open       add / declareSources / setDefaultTarget accepted
 *   finalized  after the first successful write(); only reads and
 *              further writes of the same content are allowed
 */

import type { CommandGraphState, Logger, Rule, RuleSpec } from '@bitforge/types';
import { OutputError, RuleError } from '../errors/BitforgeError.js';
import { toposort, CycleError } from '../core/toposort.js';
import { BITFORGE_VERSION } from '../version.js';
import { atomicWriteFileSync } from './atomicWrite.js';
import { renderMakefile } from './makefile.js';

export interface CommandGraphOptions {
  /** Make variable prefixed to every command. Default BITFORGE_LAUNCHER */
  launcher?: string;
  logger?: Logger;
}

interface StoredRule {
  command: readonly string[];
  targets: string[];
  dependencies: readonly string[];
  phony: boolean;
}

const INVALID_IDENTIFIER = /[\s:#$]/;
const LINE_BREAK = /[\r\n]/;

export const DEFAULT_LAUNCHER = 'BITFORGE_LAUNCHER';

export class CommandGraph {
  private readonly stored: StoredRule[] = [];
  private readonly byTarget = new Map<string, StoredRule>();
  private readonly sources = new Set<string>();
  private defaultTargetId: string | undefined;
  private currentState: CommandGraphState = 'open';
  private readonly launcher: string;
  private readonly logger?: Logger;

  constructor(options: CommandGraphOptions = {}) {
    this.launcher = options.launcher ?? DEFAULT_LAUNCHER;
    this.logger = options.logger;
  }

  get state(): CommandGraphState {
    return this.currentState;
  }

  get defaultTarget(): string | undefined {
    return this.defaultTargetId;
  }

  /** Snapshot of the rules in insertion order */
  get rules(): readonly Rule[] {
    return this.stored.map((rule) =>
      Object.freeze({
        command: Object.freeze([...rule.command]),
        targets: Object.freeze([...rule.targets]),
        dependencies: Object.freeze([...rule.dependencies]),
        phony: rule.phony,
      })
    );
  }

  get declaredSources(): readonly string[] {
    return [...this.sources];
  }

  /**
   * Append a rule.
   *
   * Command arguments must not contain CR or LF.
   *
   * Re-declaring a target is allowed only with the same command, the same
   * dependency set and the same phony flag. An identical rule is a no-op;
   * an identical recipe naming extra targets adds them to the existing rule.
   *
   * @throws RuleError ERR_CONFLICTING_RULE, ERR_INVALID_RULE, ERR_GRAPH_FINALIZED
   */
  add(command: readonly string[], targets: readonly string[], dependencies: readonly string[], options: { phony?: boolean } = {}): void {
    this.assertOpen('add', targets[0]);

    if (targets.length === 0) {
      throw new RuleError('A rule must declare at least one target', 'ERR_INVALID_RULE', {
        command: [...command],
      });
    }
    for (const id of [...targets, ...dependencies]) {
      assertIdentifier(id);
    }
    const broken = command.find((arg) => LINE_BREAK.test(arg));
    if (broken !== undefined) {
      throw new RuleError(
        `Command argument ${JSON.stringify(broken)} contains a line break, which would end the recipe line`,
        'ERR_INVALID_RULE',
        { target: targets[0], argument: broken }
      );
    }

    const candidate: StoredRule = {
      command: [...command],
      targets: [...new Set(targets)],
      dependencies: [...new Set(dependencies)],
      phony: options.phony ?? false,
    };

    let existing: StoredRule | undefined;
    for (const target of candidate.targets) {
      const declared = this.byTarget.get(target);
      if (!declared) continue;
      if (!sameRecipe(declared, candidate)) {
        throw new RuleError(
          `Target "${target}" is already produced by a different rule`,
          'ERR_CONFLICTING_RULE',
          {
            target,
            existing: { command: [...declared.command], dependencies: [...declared.dependencies], phony: declared.phony },
            conflicting: { command: [...candidate.command], dependencies: [...candidate.dependencies], phony: candidate.phony },
          }
        );
      }
      existing ??= declared;
    }

    if (existing) {
      for (const target of candidate.targets) {
        if (this.byTarget.has(target)) continue;
        existing.targets.push(target);
        this.byTarget.set(target, existing);
      }
      return;
    }

    this.stored.push(candidate);
    for (const target of candidate.targets) {
      this.byTarget.set(target, candidate);
    }
  }

  /** Add a rule as a stage contributes it */
  addRule(spec: RuleSpec): void {
    this.add(spec.command, spec.targets, spec.dependencies, { phony: spec.phony });
  }

  /**
   * Declare physical files that exist without a rule (design sources,
   * scripts, externally supplied netlists).
   */
  declareSources(names: Iterable<string>): void {
    this.assertOpen('declareSources');
    for (const name of names) {
      assertIdentifier(name);
      this.sources.add(name);
    }
  }

  /**
   * @throws RuleError ERR_DEFAULT_TARGET_ALREADY_SET when called again with a
   *   different target, ERR_GRAPH_FINALIZED
   */
  setDefaultTarget(target: string): void {
    this.assertOpen('setDefaultTarget', target);
    assertIdentifier(target);

    if (this.defaultTargetId === target) return;
    if (this.defaultTargetId !== undefined) {
      throw new RuleError(
        `Default target is already "${this.defaultTargetId}", cannot change it to "${target}"`,
        'ERR_DEFAULT_TARGET_ALREADY_SET',
        { target, current: this.defaultTargetId }
      );
    }
    this.defaultTargetId = target;
  }

  /**
   * Identifiers reached from `target` through dependencies that no rule
   * produces, in first-visit order. For a valid graph these are sources.
   */
  resolveDependencies(target: string): string[] {
    const leaves: string[] = [];
    const visited = new Set<string>();
    const visit = (id: string): void => {
      if (visited.has(id)) return;
      visited.add(id);
      const rule = this.byTarget.get(id);
      if (!rule) {
        leaves.push(id);
        return;
      }
      for (const dependency of rule.dependencies) visit(dependency);
    };

    const root = this.byTarget.get(target);
    if (!root) return [target];
    visited.add(target);
    for (const dependency of root.dependencies) visit(dependency);
    return leaves;
  }

  /**
   * Check that the graph can be handed to an executor: a default target is
   * set, everything it reaches is a rule target or a declared source, and
   * the reachable rules are acyclic.
   *
   * @throws RuleError ERR_MISSING_DEFAULT_TARGET, ERR_DANGLING_DEPENDENCY,
   *   ERR_CYCLE_DETECTED
   */
  validate(): void {
    const root = this.defaultTargetId;
    if (root === undefined) {
      throw new RuleError('No default target was set', 'ERR_MISSING_DEFAULT_TARGET', {}, 'The last stage of the flow must report a primary output');
    }

    const reachable: StoredRule[] = [];
    const seenRules = new Set<StoredRule>();
    const pending: Array<{ id: string; requiredBy?: string }> = [{ id: root }];

    for (let item = pending.pop(); item !== undefined; item = pending.pop()) {
      const rule = this.byTarget.get(item.id);
      if (!rule) {
        if (this.sources.has(item.id)) continue;
        throw new RuleError(
          item.requiredBy === undefined
            ? `Default target "${item.id}" is neither produced by a rule nor a declared source`
            : `"${item.id}", required by "${item.requiredBy}", is neither produced by a rule nor a declared source`,
          'ERR_DANGLING_DEPENDENCY',
          { target: item.id, requiredBy: item.requiredBy }
        );
      }
      if (seenRules.has(rule)) continue;
      seenRules.add(rule);
      reachable.push(rule);
      for (const dependency of rule.dependencies) {
        pending.push({ id: dependency, requiredBy: rule.targets[0] });
      }
    }

    try {
      toposort(
        reachable.map((rule) => ({
          id: rule.targets[0],
          successors: rule.dependencies.flatMap((dependency) => this.byTarget.get(dependency)?.targets[0] ?? []),
        }))
      );
    } catch (error) {
      if (error instanceof CycleError) {
        throw new RuleError(`Rules depend on each other: ${error.cycle.join(' -> ')}`, 'ERR_CYCLE_DETECTED', {
          target: error.cycle[0],
          cycle: error.cycle,
        });
      }
      throw error;
    }
  }

  /**
   * Render the Makefile. Deterministic: rules appear in insertion order and
   * the same graph always renders to the same bytes.
   */
  serialize(): string {
    this.validate();
    const defaultTarget = this.defaultTargetId ?? '';
    return renderMakefile({
      rules: this.rules,
      defaultTarget,
      version: BITFORGE_VERSION,
      launcher: this.launcher,
    });
  }

  /**
   * Validate, serialize and atomically write the Makefile, then finalize the
   * graph. Either the complete file is written or nothing is.
   *
   * @throws OutputError ERR_IO, plus the RuleErrors of validate()
   */
  write(destination: string): void {
    const content = this.serialize();
    try {
      atomicWriteFileSync(destination, content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new OutputError(`Cannot write build rules to "${destination}": ${reason}`, { filePath: destination }, { cause: error });
    }
    this.currentState = 'finalized';
    this.logger?.debug('Wrote build rules', { filePath: destination, rules: this.stored.length });
  }

  private assertOpen(operation: string, target?: string): void {
    if (this.currentState === 'finalized') {
      throw new RuleError(`Cannot ${operation}: the command graph has already been written`, 'ERR_GRAPH_FINALIZED', {
        target,
        operation,
      });
    }
  }
}

function assertIdentifier(id: string): void {
  if (id === '' || INVALID_IDENTIFIER.test(id)) {
    throw new RuleError(
      `Invalid target or dependency "${id}": identifiers must be non-empty and free of whitespace, ':', '#' and '$'`,
      'ERR_INVALID_RULE',
      { target: id }
    );
  }
}

function sameRecipe(a: StoredRule, b: StoredRule): boolean {
  return (
    a.phony === b.phony &&
    a.command.length === b.command.length &&
    a.command.every((arg, i) => arg === b.command[i]) &&
    a.dependencies.length === b.dependencies.length &&
    a.dependencies.every((dependency) => b.dependencies.includes(dependency))
  );
}
