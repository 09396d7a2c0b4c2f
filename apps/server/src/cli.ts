import { serve } from '@hono/node-server';
import { Command } from 'commander';
import { createAdminApp } from './admin-api.js';
import { loadConfig, type ServerConfig } from './config.js';
import { DNSServer } from './dns-server.js';
import { logger, toError } from './logger.js';
import { initializeMetrics, shutdownMetrics } from './otel-metrics.js';
import { parsePort } from './upstream.js';

interface CliOptions {
  port?: string;
  bind?: string;
  upstream?: string | false;
  failover?: boolean;
  adminPort?: string;
  metricsPort?: string;
}

/**
 * Environment variables give the defaults, flags override them.
 */
export function parseCli(argv: readonly string[], env: Record<string, string | undefined> = process.env): ServerConfig {
  const config = loadConfig(env);
  const program = new Command('dnserver')
    .description('Simple DNS server for development and testing')
    .argument('[zones-file]', 'TOML file with the zones to serve (env: DNSERVER_ZONES_FILE)')
    .option('-p, --port <port>', 'port to listen on, UDP and TCP (env: DNSERVER_PORT)')
    .option('-b, --bind <address>', 'address to bind to (env: DNSERVER_BIND_ADDRESS)')
    .option('-u, --upstream <addresses>', 'comma-separated upstream servers, host[:port] (env: DNSERVER_UPSTREAM)')
    .option('--no-upstream', 'answer from local records only')
    .option('--failover', 'try the next upstream when one fails (env: DNSERVER_FAILOVER)')
    .option('--admin-port <port>', 'port for the HTTP admin API (env: ADMIN_PORT)')
    .option('--metrics-port <port>', 'port for the Prometheus metrics endpoint (env: METRICS_PORT)')
    .exitOverride();

  program.parse([...argv], { from: 'user' });
  const options = program.opts<CliOptions>();
  const [zonesFile] = program.args;

  return {
    ...config,
    port: options.port === undefined ? config.port : parsePort(options.port, '--port'),
    bindAddress: options.bind ?? config.bindAddress,
    upstream: options.upstream === false ? null : options.upstream ?? config.upstream,
    failover: options.failover ?? config.failover,
    zonesFile: zonesFile ?? config.zonesFile,
    adminPort: options.adminPort === undefined ? config.adminPort : parsePort(options.adminPort, '--admin-port'),
    metricsPort: options.metricsPort === undefined ? config.metricsPort : parsePort(options.metricsPort, '--metrics-port'),
  };
}

export async function run(config: ServerConfig): Promise<void> {
  initializeMetrics({ enabled: config.metricsPort !== null, prometheusPort: config.metricsPort ?? undefined });

  const options = {
    ports: config.port,
    bindAddress: config.bindAddress,
    upstream: config.upstream,
    failover: config.failover,
    upstreamTimeoutMs: config.upstreamTimeoutMs,
  };
  const server = config.zonesFile ? await DNSServer.fromZonesFile(config.zonesFile, options) : new DNSServer(options);
  await server.start();

  const adminServer =
    config.adminPort === null
      ? null
      : serve({ fetch: createAdminApp(server, { apiKey: config.adminApiKey }).fetch, port: config.adminPort }, (info) => {
          logger.info('Admin API running', { port: info.port });
        });

  const shutdown = (signal: string) => {
    logger.info('Shutting down DNS server', { signal });
    adminServer?.close();
    Promise.all([server.stop(), shutdownMetrics()]).then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Error during shutdown', { error: toError(error) });
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}
