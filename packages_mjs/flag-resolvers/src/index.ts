export * from './errors.js';
export { currentVerbosity, type ResolutionSource } from './logger.js';
export * from './names.js';
export * from './once.js';
export * from './resolver.js';
export * from './schema.js';
export { decodeDocument, type DocumentSource } from './decode.js';
export * from './document.js';
export * from './env.js';
