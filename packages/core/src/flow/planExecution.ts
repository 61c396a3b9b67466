/**
 * Executor commands for a configured work root.
 * The core never runs them; a front end or CI script does.
 */

import type { ExecutionPlan, FlowDefinition, OptionMap } from '@bitforge/types';
import { readFlowOption } from './resolveElisions.js';

const SYNTH_TARGET = 'synth';

export function planExecution(flow: FlowDefinition, options: OptionMap, workRoot: string): ExecutionPlan {
  const rule = flow.execution;
  if (!rule) {
    return { build: { command: 'make', args: [], cwd: workRoot }, run: null };
  }

  const value = readFlowOption(flow, options, rule.option);
  if (typeof value === 'string' && rule.synthOnlyWhen.includes(value)) {
    return { build: { command: 'make', args: [SYNTH_TARGET], cwd: workRoot }, run: null };
  }

  return {
    build: { command: 'make', args: [], cwd: workRoot },
    run: { command: 'make', args: [rule.programTarget], cwd: workRoot },
  };
}
