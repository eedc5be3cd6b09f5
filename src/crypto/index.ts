export * from './token-codec.js';
export * from './random.js';
export * from './pkce.js';
export * from './hash.js';
