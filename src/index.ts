export { createTokenRelayServer } from './app.js';
export type { TokenRelayServer, TokenRelayServerOptions } from './app.js';
export { ProviderClient } from './services/provider-client.js';
export type { ProviderClientOptions, RedeemOptions } from './services/provider-client.js';
export { TokenSupplier } from './services/token-supplier.js';
export type { SupplierState, SuppliedToken, SupplierResult, TokenSupplierOptions } from './services/token-supplier.js';
export { CallbackInterceptor } from './services/callback-interceptor.js';
export type { CallbackInterceptorOptions } from './services/callback-interceptor.js';
export { ScopeService, scopeService } from './services/scope-service.js';
export { HonoCookieSink, readArtifact, tokenCookies } from './middleware/token-cookies.js';
export { relayErrorHandler, securityHeaders, requestLogger } from './middleware/error-handler.js';
export * from './host/auth-hooks.js';
export * from './types/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export * from './crypto/index.js';
