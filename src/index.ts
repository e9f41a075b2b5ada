export * from './apis/v1/condition.js';
export * from './apis/v1/machine.js';
export * from './apis/v1/machine-health-check.js';
export * from './types/index.js';
export * as conditions from './conditions/index.js';
export { loadConfig } from './config/index.js';
export type { Config } from './config/index.js';
