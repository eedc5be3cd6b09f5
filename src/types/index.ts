export * from './result.js';
export * from './token.js';
export * from './provider.js';
export * from './hono.js';
