/**
 * Gateway entry point
 */

import { randomBytes } from 'crypto';
import type { Server as HttpServer } from 'http';
import { types } from 'util';
import { config } from './config';
import { logger } from './utils/logger';
import { createApp } from './app';
import { ServerRegistry, RegistryError } from './services/serverRegistry';
import { RegistryBootTimeEstimator } from './services/bootTimeEstimator';
import { WakeDispatcher } from './services/wakeDispatcher';
import { ReadinessDetector } from './services/readinessDetector';
import { AccessLockManager } from './services/accessLockManager';
import { GatewayOrchestrator } from './services/gatewayOrchestrator';
import { AdminUserDatabase } from './services/adminUserDatabase';
import { AdminCredentials } from './services/adminCredentials';

function resolveSessionSecret(): string {
  if (config.session.secret) {
    return config.session.secret;
  }

  logger.warn('SESSION_SECRET is not set; using a random secret. Sessions and unlocks reset on restart.');
  return randomBytes(32).toString('hex');
}

export class Server {
  private registry: ServerRegistry;
  private userDatabase: AdminUserDatabase;
  private httpServer: HttpServer | null = null;

  constructor() {
    this.registry = new ServerRegistry(config.registry.path);
    this.userDatabase = new AdminUserDatabase(config.database.path);
  }

  async start(): Promise<void> {
    try {
      await this.registry.load();

      const credentials = new AdminCredentials(this.userDatabase);
      if (config.admin.enabled) {
        this.userDatabase.initialize();
        await credentials.seedInitialUser(config.admin.bootstrapUsername, config.admin.bootstrapPassword);
      }

      const estimator = new RegistryBootTimeEstimator(this.registry);
      const orchestrator = new GatewayOrchestrator({
        registry: this.registry,
        dispatcher: new WakeDispatcher({
          mode: config.wake.sender,
          commandTimeoutMs: config.wake.commandTimeoutMs,
        }),
        readiness: new ReadinessDetector({
          probeTimeoutMs: config.readiness.probeTimeoutMs,
          pollIntervalSeconds: config.readiness.pollIntervalSeconds,
          estimator,
        }),
        estimator,
        locks: new AccessLockManager({ ttlMs: config.session.unlockTtlMs }),
      });

      const app = createApp(
        {
          orchestrator,
          registry: this.registry,
          credentials,
          adminEnabled: config.admin.enabled,
          requestRestart: () => this.shutdown('Restart requested'),
        },
        {
          sessionSecret: resolveSessionSecret(),
          cookieSecure: config.session.cookieSecure,
          unlockTtlMs: config.session.unlockTtlMs,
          trustProxy: config.server.trustProxy,
          corsOrigins: config.cors.origins,
        }
      );

      const port = this.registry.getPort();
      const host = config.server.host;
      this.httpServer = app.listen(port, host, (error?: Error) => {
        if (error) {
          logger.error('Failed to bind HTTP server', { host, port, error: error.message });
          process.exit(1);
          return;
        }

        logger.info(`Server listening on ${host}:${port}`);
        logger.info(`Environment: ${config.server.env}`);
        logger.info(`Managing ${this.registry.count()} server(s)`);
        logger.info(`Admin panel ${config.admin.enabled ? 'enabled' : 'disabled'}`);
      });

      // Graceful shutdown
      this.setupGracefulShutdown();
    } catch (error) {
      if (error instanceof RegistryError) {
        logger.error(`Cannot start gateway: ${error.message}`, {
          code: error.code,
          field: error.field,
          path: config.registry.path,
        });
      } else {
        logger.error('Failed to start server', {
          error: types.isNativeError(error) ? error.message : String(error),
        });
      }
      process.exit(1);
    }
  }

  private shutdown(reason: string): void {
    logger.info(`${reason}, starting graceful shutdown`);

    const finish = () => {
      void this.registry
        .flush()
        .catch((error: unknown) => {
          logger.error('Failed to flush the registry during shutdown', {
            error: types.isNativeError(error) ? error.message : String(error),
          });
        })
        .finally(() => {
          this.userDatabase.close();
          logger.info('Graceful shutdown complete');
          process.exit(0);
        });
    };

    if (this.httpServer) {
      this.httpServer.close(() => {
        logger.info('HTTP server closed');
        finish();
      });
      this.httpServer.closeIdleConnections();
    } else {
      finish();
    }
  }

  private setupGracefulShutdown(): void {
    process.on('SIGTERM', () => this.shutdown('Received SIGTERM'));
    process.on('SIGINT', () => this.shutdown('Received SIGINT'));
  }
}

export function runServerCli(
  currentModule: NodeModule,
  mainModule: NodeModule | undefined = require.main,
  createServer: () => Server = () => new Server()
): Server | null {
  if (mainModule !== currentModule) {
    return null;
  }

  const server = createServer();
  void server.start();
  return server;
}

void runServerCli(module);
