/**
 * @bitforge/core - Flow and command graph engine for FPGA toolchains
 */

// Error types
export {
  BitforgeError,
  FlowError,
  RuleError,
  StageError,
  OutputError,
  ConfigError,
} from './errors/BitforgeError.js';
export type {
  ErrorCode,
  ErrorContext,
  ErrorSeverity,
  BitforgeErrorJSON,
  FlowErrorCode,
  RuleErrorCode,
  StageErrorCode,
} from './errors/BitforgeError.js';

// Logging
export { ConsoleLogger, FileLogger, MultiLogger, createLogger, formatMessage, isLogLevel, LOG_LEVELS } from './logging/Logger.js';
export type { Logger, LogLevel } from './logging/Logger.js';

// Config
export { loadConfig, validateConfig, DEFAULT_CONFIG } from './config/index.js';
export type { BitforgeConfig } from './config/index.js';

// Version
export { BITFORGE_VERSION } from './version.js';

// Ordering
export { toposort, CycleError } from './core/toposort.js';
export type { ToposortItem } from './core/toposort.js';

// Stage registry
export { StageRegistry, defaultRegistry } from './registry/StageRegistry.js';
export { orderStages } from './registry/orderStages.js';
export { BUILTIN_FLOWS, ISE_FLOW, ICESTORM_FLOW } from './flows/builtin.js';

// Flow graph
export { FlowGraphBuilder, resolveOptions, matchesRequirement } from './flow/FlowGraphBuilder.js';
export type { FlowBuildConfig, FlowGraphBuilderDeps } from './flow/FlowGraphBuilder.js';
export { resolveElisions, readFlowOption } from './flow/resolveElisions.js';
export type { ElisionOptions } from './flow/resolveElisions.js';
export { planExecution } from './flow/planExecution.js';

// Stages
export { StageCatalog, createDefaultCatalog } from './stages/StageCatalog.js';
export { YosysStage } from './stages/YosysStage.js';
export { IseStage } from './stages/IseStage.js';
export { NextpnrStage } from './stages/NextpnrStage.js';
export { IcepackStage } from './stages/IcepackStage.js';

// Command graph
export { CommandGraph, DEFAULT_LAUNCHER } from './commands/CommandGraph.js';
export type { CommandGraphOptions } from './commands/CommandGraph.js';
export { renderMakefile, renderCommand, quoteArgument, escapeForMake } from './commands/makefile.js';
export type { MakefileInput } from './commands/makefile.js';

// Runner
export { configureFlow } from './FlowRunner.js';
export type { ConfigureFlowOptions, ConfigureFlowResult } from './FlowRunner.js';

// Shared contracts
export type * from '@bitforge/types';
