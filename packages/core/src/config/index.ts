/**
 * Configuration loading utilities
 */
export { loadConfig, validateConfig, DEFAULT_CONFIG } from './ConfigLoader.js';
export type { BitforgeConfig } from './ConfigLoader.js';
