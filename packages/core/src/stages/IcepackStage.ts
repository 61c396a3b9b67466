/**
 * icepack stage: ASCII bitstream to binary, plus programming with iceprog.
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

export class IcepackStage implements StageVariant {
  readonly id = 'icepack';
  readonly description = 'Pack an iCE40 ASCII bitstream and program it with iceprog';
  readonly options: Record<string, OptionSpec> = {};

  consumes(_ctx: StageContext): ArtifactRequirement[] {
    return [{ fileType: 'iceAsc' }];
  }

  produces(ctx: StageContext): Artifact[] {
    return [{ name: `${ctx.project.name}.bin`, fileType: 'bitstream' }];
  }

  configure(ctx: ConfigureContext): StageContribution {
    const bin = `${ctx.project.name}.bin`;
    const asc = ctx.inputs.find((artifact) => artifact.fileType === 'iceAsc')?.name ?? `${ctx.project.name}.asc`;

    return {
      rules: [
        { command: ['icepack', asc, bin], targets: [bin], dependencies: [asc] },
        { command: ['iceprog', bin], targets: ['pgm'], dependencies: [bin], phony: true },
      ],
      primaryOutput: bin,
    };
  }
}
