/**
 * Prism - HTTP Server
 * Builds the agent from configuration and serves the API
 */

import http from 'http';
import type { AddressInfo } from 'net';

import type { Application } from 'express';

import { AnalyticsAgent } from '../agent/pipeline.js';
import { Catalog } from '../catalog/catalog.js';
import { SqlCompiler } from '../dsl/compiler.js';
import { PolicyEngine } from '../policy/engine.js';
import { createDefaultPolicyRules } from '../policy/rules.js';
import { createExecutor } from '../storage/index.js';
import type { QueryExecutor } from '../storage/types.js';
import logger, { logLifecycle } from '../utils/logger.js';
import { toErrorMessage } from '../utils/helpers.js';
import type { PrismConfig } from '../utils/types.js';
import { createApp } from './app.js';

export class PrismServer {
  private readonly config: PrismConfig;
  private app: Application | null = null;
  private server: http.Server | null = null;
  private executor: QueryExecutor | null = null;
  private isShuttingDown = false;

  constructor(config: PrismConfig) {
    this.config = config;
  }

  /**
   * Load the catalog, open the data source and assemble the agent
   */
  public async initialize(): Promise<Application> {
    const { config } = this;

    const catalog = Catalog.load(config.catalog.path);
    const executor = await createExecutor(config.dataSource);
    this.executor = executor;

    const agent = new AnalyticsAgent({
      catalog,
      policyEngine: new PolicyEngine(
        createDefaultPolicyRules({
          minGroupSize: config.policy.minGroupSize,
          privilegedRoles: config.policy.privilegedRoles,
        })
      ),
      compiler: new SqlCompiler({
        dialect: config.dataSource.driver,
        validation: { maxResultLimit: config.query.maxResultLimit },
      }),
      executeTimeoutMs: config.query.executeTimeoutMs,
      defaultLimit: config.query.defaultLimit,
    });

    this.app = createApp({ agent, executor, catalog });
    logLifecycle('startup', 'Analytics agent initialized', {
      dialect: agent.getDialect(),
      dataProducts: catalog.getDataProducts().length,
    });
    return this.app;
  }

  /**
   * Start listening for requests
   */
  public async start(): Promise<void> {
    const app = this.app ?? (await this.initialize());
    const { port, host } = this.config.server;

    return new Promise((resolve, reject) => {
      const server = http.createServer(app);
      this.server = server;

      server.listen(port, host, () => {
        const address = server.address();
        const bound: Partial<AddressInfo> = typeof address === 'object' && address !== null ? address : {};

        logLifecycle('ready', `Prism listening on ${bound.address ?? host}:${bound.port ?? port}`, {
          environment: this.config.server.nodeEnv,
          driver: this.config.dataSource.driver,
        });
        resolve();
      });

      server.on('error', (error) => {
        logLifecycle('error', 'Server error', { error: error.message });
        reject(error);
      });
    });
  }

  /**
   * Stop accepting connections and release the data source
   */
  public async shutdown(signal?: string): Promise<void> {
    if (this.isShuttingDown) {
      return;
    }
    this.isShuttingDown = true;

    logLifecycle('shutdown', `Shutting down${signal ? ` (${signal})` : ''}...`);

    const { server } = this;
    if (server !== null) {
      await new Promise<void>((resolve) => {
        server.close(() => resolve());
      });
    }

    if (this.executor !== null) {
      try {
        await this.executor.close();
        logLifecycle('shutdown', 'Data source closed');
      } catch (error) {
        logger.error('Error closing data source', { error: toErrorMessage(error) });
      }
    }

    logLifecycle('shutdown', 'Shutdown complete');
  }
}
