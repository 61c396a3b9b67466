/**
 * FlowRunner - configures one build invocation end to end
 *
 *   registry.resolve(flow) -> resolveElisions -> FlowGraphBuilder.build
 *   -> stage.configure() for each stage in order -> CommandGraph -> Makefile
 *
 * Stages only return rules; the runner is the single writer of the
 * command graph, which never outlives the invocation.
 */

import { mkdirSync } from 'fs';
import { join, resolve } from 'path';
import type { ExecutionPlan, FlowGraph, Logger, ProjectMetadata, StageContribution, StageInstance } from '@bitforge/types';
import { BitforgeError, StageError } from './errors/BitforgeError.js';
import { StageRegistry, defaultRegistry } from './registry/StageRegistry.js';
import { StageCatalog, createDefaultCatalog } from './stages/StageCatalog.js';
import { FlowGraphBuilder } from './flow/FlowGraphBuilder.js';
import { resolveElisions } from './flow/resolveElisions.js';
import { planExecution } from './flow/planExecution.js';
import { CommandGraph } from './commands/CommandGraph.js';
import { DEFAULT_CONFIG, type BitforgeConfig } from './config/index.js';
import { createLogger, MultiLogger } from './logging/Logger.js';

export interface ConfigureFlowOptions {
  flow: string;
  project: ProjectMetadata;
  /** Directory receiving the Makefile. Created when missing */
  workRoot: string;
  /** Base for a relative config.logFile. Default: process.cwd() */
  projectPath?: string;
  registry?: StageRegistry;
  catalog?: StageCatalog;
  config?: BitforgeConfig;
  logger?: Logger;
}

export interface ConfigureFlowResult {
  flowGraph: FlowGraph;
  commands: CommandGraph;
  makefilePath: string;
  execution: ExecutionPlan;
}

export function configureFlow(options: ConfigureFlowOptions): ConfigureFlowResult {
  const config = options.config ?? DEFAULT_CONFIG;
  const registry = options.registry ?? defaultRegistry;
  const catalog = options.catalog ?? createDefaultCatalog();
  const logger =
    options.logger ??
    createLogger(config.logLevel, {
      logFile: config.logFile ? resolve(options.projectPath ?? process.cwd(), config.logFile) : undefined,
    });
  try {
    return configureWith(options, config, registry, catalog, logger);
  } finally {
    // A logger this call opened is closed by it; an injected one belongs to the caller
    if (options.logger === undefined && logger instanceof MultiLogger) {
      logger.end();
    }
  }
}

function configureWith(
  options: ConfigureFlowOptions,
  config: BitforgeConfig,
  registry: StageRegistry,
  catalog: StageCatalog,
  logger: Logger
): ConfigureFlowResult {
  const { project } = options;

  const flow = registry.getFlow(options.flow);
  logger.info('Configuring flow', { flow: flow.name, project: project.name });

  const elide = resolveElisions(flow, project.options, { strict: config.strict, logger });
  const flowGraph = new FlowGraphBuilder({ catalog, logger }).build(flow.stages, project, {
    flow: flow.name,
    elide,
  });

  const commands = new CommandGraph({ launcher: config.launcher, logger });
  commands.declareSources(project.files.map((file) => file.name));

  let primaryOutput: string | undefined;
  for (const stage of flowGraph.stages) {
    const contribution = configureStage(stage, project, logger);
    for (const rule of contribution.rules) {
      commands.addRule(rule);
    }
    commands.declareSources(contribution.scripts ?? []);
    primaryOutput = contribution.primaryOutput;
    logger.debug('Stage configured', {
      stage: stage.toolId,
      rules: contribution.rules.length,
      primaryOutput: contribution.primaryOutput,
    });
  }

  // The last stage's canonical output is what `make` builds by default
  if (primaryOutput !== undefined) {
    commands.setDefaultTarget(primaryOutput);
  }

  mkdirSync(options.workRoot, { recursive: true });
  const makefilePath = join(options.workRoot, config.makefile);
  commands.write(makefilePath);
  logger.info('Build rules written', { filePath: makefilePath, defaultTarget: commands.defaultTarget });

  return {
    flowGraph,
    commands,
    makefilePath,
    execution: planExecution(flow, project.options, options.workRoot),
  };
}

function configureStage(stage: StageInstance, project: ProjectMetadata, logger: Logger): StageContribution {
  logger.info('Configuring stage', { stage: stage.toolId });
  try {
    return stage.variant.configure({
      project,
      options: stage.options,
      logger,
      inputs: stage.inputs,
      files: project.files,
    });
  } catch (error) {
    if (error instanceof BitforgeError) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new StageError(`Stage "${stage.toolId}" failed to configure: ${reason}`, 'ERR_STAGE_FAILED', { stage: stage.toolId }, undefined, {
      cause: error,
    });
  }
}
