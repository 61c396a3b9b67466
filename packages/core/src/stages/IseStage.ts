/**
 * Xilinx ISE stage
 *
 * Creates the ISE project, optionally synthesizes with XST, runs
 * implementation to a bitstream and programs the board. The Tcl scripts it
 * names come from the ISE templates and are declared as sources.
 *
 * Options:
 *   synth  ise (default) synthesizes inside ISE. Any other value is the
 *          netlist flow: an EDIF netlist is required as input instead.
 *   part   passed to the programming script when set
 */

import type {
  Artifact,
  ArtifactRequirement,
  ConfigureContext,
  OptionSpec,
  RuleSpec,
  StageContext,
  StageContribution,
  StageVariant,
} from '@bitforge/types';
import { StageError } from '../errors/BitforgeError.js';
import { stringOption } from './options.js';

const XTCLSH = 'xtclsh';

export class IseStage implements StageVariant {
  readonly id = 'ise';
  readonly description = 'Xilinx ISE project, implementation, bitstream and programming';
  readonly options: Record<string, OptionSpec> = {
    part: { type: 'string', description: 'Full part name handed to the programming script' },
    synth: {
      type: 'string',
      description: 'Synthesis tool. ise (default) synthesizes in ISE; anything else expects an EDIF netlist.',
      default: 'ise',
    },
  };

  consumes(ctx: StageContext): ArtifactRequirement[] {
    return this.synthesizesInternally(ctx) ? [] : [{ fileType: 'edif' }];
  }

  produces(ctx: StageContext): Artifact[] {
    return [{ name: `${ctx.project.name}.bit`, fileType: 'bitstream' }];
  }

  configure(ctx: ConfigureContext): StageContribution {
    const name = ctx.project.name;
    const internalSynth = this.synthesizesInternally(ctx);

    if (internalSynth) {
      const unsupported = ctx.files.find((file) => file.fileType.startsWith('systemVerilogSource'));
      if (unsupported) {
        throw new StageError(
          `ISE cannot synthesize SystemVerilog source "${unsupported.name}"`,
          'ERR_UNSUPPORTED_SOURCE',
          { stage: this.id, filePath: unsupported.name },
          'Select synth: yosys to synthesize with Yosys instead'
        );
      }
    }

    // Bound inputs gate the synth milestone; project netlists (IP cores) only join the project
    const edifInputs = uniqueNames(ctx.inputs.filter((artifact) => artifact.fileType === 'edif'));
    const edifFiles = uniqueNames([
      ...ctx.inputs.filter((artifact) => artifact.fileType === 'edif'),
      ...ctx.files.filter((file) => file.fileType === 'edif'),
    ]);

    const projectTcl = `${name}.tcl`;
    const synthTcl = `${name}_synth.tcl`;
    const runTcl = `${name}_run.tcl`;
    const pgmTcl = `${name}_pgm.tcl`;
    const projectFile = `${name}.xise`;
    const bitstream = `${name}.bit`;

    const rules: RuleSpec[] = [
      { command: [XTCLSH, projectTcl], targets: [projectFile], dependencies: [projectTcl, ...edifFiles] },
    ];

    let synthTargets = edifInputs;
    if (internalSynth) {
      const marker = `${name}/__synthesis_is_complete__`;
      rules.push({ command: [XTCLSH, synthTcl, projectFile], targets: [marker], dependencies: [synthTcl, projectFile] });
      synthTargets = [marker];
    }
    rules.push({ command: [], targets: ['synth'], dependencies: synthTargets, phony: true });

    rules.push({ command: [XTCLSH, runTcl, projectFile], targets: [bitstream], dependencies: [runTcl, projectFile] });

    rules.push({ command: ['ise', projectFile], targets: ['build-gui'], dependencies: [projectFile], phony: true });

    const part = stringOption(this.id, ctx.options, 'part');
    rules.push({
      command: [
        'ise', '-quiet', '-nolog', '-notrace', '-mode', 'batch', '-source', pgmTcl, '-tclargs',
        ...(part ? [part] : []),
        bitstream,
      ],
      targets: ['pgm'],
      dependencies: [pgmTcl, bitstream],
      phony: true,
    });

    return {
      rules,
      primaryOutput: bitstream,
      scripts: internalSynth ? [projectTcl, synthTcl, runTcl, pgmTcl] : [projectTcl, runTcl, pgmTcl],
    };
  }

  private synthesizesInternally(ctx: StageContext): boolean {
    return stringOption(this.id, ctx.options, 'synth', 'ise') === 'ise';
  }
}

function uniqueNames(artifacts: readonly Artifact[]): string[] {
  return [...new Set(artifacts.map((artifact) => artifact.name))];
}
