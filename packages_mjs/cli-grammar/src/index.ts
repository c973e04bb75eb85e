export * from './json.js';
export * from './errors.js';
export * from './tokens.js';
export * from './scanner.js';
export * from './mappers.js';
export * from './model.js';
export * from './resolver.js';
export * from './context.js';
