export * from './accessor.js';
export * from './clock.js';
export * from './factories.js';
export * from './getter.js';
export * from './matchers.js';
export * from './registry.js';
export * from './setter.js';
export * from './state.js';
