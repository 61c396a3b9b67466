/**
 * nextpnr place & route stage. Reads the Yosys JSON netlist and the
 * project's PCF constraints, writes an ASCII bitstream.
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
import { listOption, requireStringOption, stringOption } from './options.js';

export class NextpnrStage implements StageVariant {
  readonly id = 'nextpnr';
  readonly description = 'Place & route with nextpnr';
  readonly options: Record<string, OptionSpec> = {
    arch: { type: 'string', description: 'nextpnr architecture, selects nextpnr-<arch> (e.g. ice40)' },
    device: { type: 'string', description: 'Device flag without dashes (e.g. hx8k, up5k)' },
    package: { type: 'string', description: 'Device package (e.g. ct256)' },
    nextpnr_options: { type: 'list', description: 'Extra command line arguments' },
  };

  consumes(_ctx: StageContext): ArtifactRequirement[] {
    return [{ fileType: 'jsonNetlist' }];
  }

  produces(ctx: StageContext): Artifact[] {
    return [{ name: `${ctx.project.name}.asc`, fileType: 'iceAsc' }];
  }

  configure(ctx: ConfigureContext): StageContribution {
    const arch = requireStringOption(this.id, ctx.options, 'arch');
    const device = stringOption(this.id, ctx.options, 'device');
    const pkg = stringOption(this.id, ctx.options, 'package');
    const asc = `${ctx.project.name}.asc`;

    const netlists = ctx.inputs.filter((artifact) => artifact.fileType === 'jsonNetlist').map((a) => a.name);
    const constraints = ctx.files.filter((file) => file.fileType === 'PCF').map((file) => file.name);

    const command = [
      `nextpnr-${arch}`,
      ...(device ? [`--${device}`] : []),
      ...(pkg ? ['--package', pkg] : []),
      ...constraints.flatMap((file) => ['--pcf', file]),
      ...netlists.flatMap((file) => ['--json', file]),
      '--asc', asc,
      ...listOption(this.id, ctx.options, 'nextpnr_options'),
    ];

    return {
      rules: [{ command, targets: [asc], dependencies: [...netlists, ...constraints] }],
      primaryOutput: asc,
    };
  }
}
