/**
 * Yosys synthesis stage
 *
 * Reads the project's Verilog and SystemVerilog sources and writes one
 * netlist in the format the next stage expects:
 *
 *   yosys -l yosys.log -p "synth_<arch> -top <top> -<fmt> <name>.<ext>" <sources...>
 */

import type {
  Artifact,
  ArtifactRequirement,
  ConfigureContext,
  OptionSpec,
  StageContext,
  StageContribution,
  StageVariant,
} from '@bitforge/types';
import { enumOption, listOption, requireStringOption } from './options.js';

const OUTPUT_FORMATS = ['edif', 'json', 'blif'] as const;
type OutputFormat = (typeof OUTPUT_FORMATS)[number];

const NETLIST_FILE_TYPE: Record<OutputFormat, string> = {
  edif: 'edif',
  json: 'jsonNetlist',
  blif: 'blif',
};

const SOURCE_PREFIXES = ['verilogSource', 'systemVerilogSource'];

export class YosysStage implements StageVariant {
  readonly id = 'yosys';
  readonly description = 'Open source synthesis with Yosys';
  readonly options: Record<string, OptionSpec> = {
    arch: {
      type: 'string',
      description: 'Target architecture, selects the synth_<arch> command (e.g. xilinx, ice40)',
    },
    output_format: {
      type: 'string',
      description: 'Netlist format written for the next stage',
      values: OUTPUT_FORMATS,
      default: 'json',
    },
    yosys_synth_options: {
      type: 'list',
      description: 'Extra arguments appended to the synth_<arch> command',
    },
  };

  consumes(_ctx: StageContext): ArtifactRequirement[] {
    return [];
  }

  produces(ctx: StageContext): Artifact[] {
    const format = this.format(ctx);
    return [{ name: `${ctx.project.name}.${format}`, fileType: NETLIST_FILE_TYPE[format] }];
  }

  configure(ctx: ConfigureContext): StageContribution {
    const arch = requireStringOption(this.id, ctx.options, 'arch');
    const format = this.format(ctx);
    const top = ctx.project.toplevel ?? ctx.project.name;
    const netlist = `${ctx.project.name}.${format}`;

    const sources = ctx.files
      .filter((file) => SOURCE_PREFIXES.some((prefix) => file.fileType.startsWith(prefix)))
      .map((file) => file.name);
    if (sources.length === 0) {
      ctx.logger.warn('No Verilog sources for synthesis', { stage: this.id });
    }

    const script = [`synth_${arch}`, '-top', top, `-${format}`, netlist, ...listOption(this.id, ctx.options, 'yosys_synth_options')];

    return {
      rules: [
        {
          command: ['yosys', '-l', 'yosys.log', '-p', script.join(' '), ...sources],
          targets: [netlist],
          dependencies: sources,
        },
        { command: [], targets: ['synth'], dependencies: [netlist], phony: true },
      ],
      primaryOutput: netlist,
    };
  }

  private format(ctx: StageContext): OutputFormat {
    return enumOption(this.id, ctx.options, 'output_format', OUTPUT_FORMATS, 'json');
  }
}
