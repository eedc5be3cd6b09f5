import { serve } from '@hono/node-server';
import { createTokenRelayServer } from './app.js';
import { getConfig, type Config } from './config/index.js';
import { ConfigError } from './errors/config-error.js';

// Load configuration; a misconfigured deployment never starts
let config: Config;
try {
  config = getConfig();
} catch (error) {
  if (error instanceof ConfigError) {
    console.error(error.message);
    process.exit(1);
  }
  throw error;
}

const { app } = createTokenRelayServer({
  config,
  enableLogging: config.server.nodeEnv !== 'test',
});

// Start server
serve(
  {
    fetch: app.fetch,
    port: config.server.port,
    hostname: config.server.host,
  },
  (info) => {
    console.log(`Graph token relay running at http://${info.address}:${info.port}`);
    console.log('');
    console.log('Endpoints:');
    console.log(`  Sign in:  ${config.server.baseUrl}/signin/microsoft`);
    console.log(`  Callback: ${config.server.baseUrl}/signin/microsoft/callback`);
    console.log(`  Session:  ${config.server.baseUrl}/session`);
    console.log(`  Sign out: ${config.server.baseUrl}/signout`);
  }
);
