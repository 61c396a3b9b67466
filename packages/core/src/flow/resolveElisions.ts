/**
 * Turn a flow's elision rules and the project's switches into the list of
 * stages to drop.
 */

import type { FlowDefinition, Logger, OptionMap } from '@bitforge/types';
import { FlowError } from '../errors/BitforgeError.js';

export interface ElisionOptions {
  /**
   * true: a switch value outside the option's allowed set fails.
   * false: it is reported and the stage stays in the flow.
   */
  strict: boolean;
  logger?: Logger;
}

/**
 * Read a documented flow switch, falling back to its default.
 * Returns undefined when neither is set.
 */
export function readFlowOption(flow: FlowDefinition, options: OptionMap, name: string): unknown {
  return options[name] ?? flow.options[name]?.default;
}

/**
 * @returns tool ids to elide, in rule order
 * @throws FlowError ERR_INVALID_FLOW_OPTION (strict mode only)
 */
export function resolveElisions(flow: FlowDefinition, options: OptionMap, elision: ElisionOptions): string[] {
  const elided: string[] = [];

  for (const rule of flow.elisions) {
    const value = readFlowOption(flow, options, rule.option);
    const allowed = flow.options[rule.option]?.values;

    if (allowed && (typeof value !== 'string' || !allowed.includes(value))) {
      const context = { flow: flow.name, stage: rule.stage, option: rule.option, value };
      if (elision.strict) {
        throw new FlowError(
          `Option "${rule.option}" of flow "${flow.name}" must be one of ${allowed.join(', ')}, got ${JSON.stringify(value)}`,
          'ERR_INVALID_FLOW_OPTION',
          context,
          'Set strict: false in .bitforge/config.yaml to keep the stage instead'
        );
      }
      elision.logger?.warn(`Unrecognized value for "${rule.option}", keeping stage "${rule.stage}"`, context);
      continue;
    }

    if (typeof value !== 'string' || !rule.keepWhen.includes(value)) {
      elided.push(rule.stage);
    }
  }

  return elided;
}
