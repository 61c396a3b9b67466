/**
 * Built-in flows.
 *
 * ise:      yosys -> ise. Yosys only runs when `synth: yosys` is selected;
 *           otherwise ISE synthesizes the design itself.
 * icestorm: yosys -> nextpnr -> icepack for Lattice iCE40 parts.
 */

import type { FlowDefinition } from '@bitforge/types';

export const ISE_FLOW: FlowDefinition = {
  name: 'ise',
  description: 'Xilinx ISE implementation and programming, optionally fed by Yosys synthesis',
  stages: [
    { toolId: 'yosys', successors: ['ise'], optionOverrides: { arch: 'xilinx', output_format: 'edif' } },
    { toolId: 'ise', successors: [], optionOverrides: {} },
  ],
  options: {
    synth: {
      type: 'string',
      description: 'Synthesis tool. Allowed values are ise (default) and yosys.',
      values: ['ise', 'yosys'],
      default: 'ise',
    },
    pnr: {
      type: 'string',
      description: 'Place & route tool. Allowed values are ise (default) and none (stop after synthesis).',
      values: ['ise', 'none'],
      default: 'ise',
    },
  },
  elisions: [{ stage: 'yosys', option: 'synth', keepWhen: ['yosys'] }],
  execution: { option: 'pnr', synthOnlyWhen: ['none'], programTarget: 'pgm' },
};

export const ICESTORM_FLOW: FlowDefinition = {
  name: 'icestorm',
  description: 'Open source iCE40 flow: Yosys synthesis, nextpnr place & route, icepack bitstream',
  stages: [
    { toolId: 'yosys', successors: ['nextpnr'], optionOverrides: { arch: 'ice40', output_format: 'json' } },
    { toolId: 'nextpnr', successors: ['icepack'], optionOverrides: { arch: 'ice40' } },
    { toolId: 'icepack', successors: [], optionOverrides: {} },
  ],
  options: {
    pnr: {
      type: 'string',
      description: 'Place & route tool. Allowed values are next (default) and none (stop after synthesis).',
      values: ['next', 'none'],
      default: 'next',
    },
  },
  elisions: [],
  execution: { option: 'pnr', synthOnlyWhen: ['none'], programTarget: 'pgm' },
};

export const BUILTIN_FLOWS: readonly FlowDefinition[] = [ISE_FLOW, ICESTORM_FLOW];
