/**
 * Project Types - the build metadata a caller hands to a flow
 */

/**
 * Option map. Values stay opaque to the flow machinery; each stage variant
 * narrows the keys it reads.
 */
export type OptionMap = Readonly<Record<string, unknown>>;

/**
 * A design file supplied by the project.
 *
 * fileType is given explicitly (e.g. 'verilogSource-2005', 'UCF', 'edif');
 * nothing here guesses it from the extension.
 */
export interface SourceFile {
  name: string;
  fileType: string;
  /** VHDL library the file belongs to, if any */
  logicalName?: string;
}

export interface ProjectMetadata {
  /** Project name. Canonical outputs derive from it, e.g. `<name>.bit` */
  name: string;
  /** Top-level design unit. Defaults to `name` */
  toplevel?: string;
  files: readonly SourceFile[];
  /** Global options, flow switches (synth, pnr) included */
  options: OptionMap;
  /** Per-tool options, keyed by tool id. Most specific layer */
  toolOptions?: Readonly<Record<string, OptionMap>>;
}

/**
 * A named file a stage produces or consumes.
 */
export interface Artifact {
  name: string;
  fileType: string;
}

/**
 * What a stage needs as input. Matched by fileType, and by name when given.
 */
export interface ArtifactRequirement {
  fileType: string;
  name?: string;
}
