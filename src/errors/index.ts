export * from './error-codes.js';
export * from './config-error.js';
export * from './decode-error.js';
export * from './provider-error.js';
export * from './supplier-error.js';
export * from './signin-error.js';
