export * from './lib/num/index.js';
export { configure, getConfig, loadConfig, resetConfigCache } from './config/index.js';
export type { RuntimeConfig } from './config/index.js';
export { createLogger, getLogger, withScope } from './log.js';
