/**
 * Application context: every long-lived collaborator, built once at
 * startup and torn down once at shutdown.
 */

import type { Logger } from "pino";
import { UsageLedger } from "../audit/ledger.js";
import { UsageTracker } from "../audit/tracker.js";
import { ConnectionCatalog } from "../collaborators/connections.js";
import {
  HttpDocumentationSearch,
  UnconfiguredDocumentationSearch,
} from "../collaborators/docs-search.js";
import { YamlConfigGenerator, type ConfigGenerator } from "../collaborators/generator.js";
import { KnowledgeBase } from "../collaborators/knowledge.js";
import type { DocumentationSearch } from "../collaborators/types.js";
import {
  createWarehouse,
  WarehouseManager,
  type WarehouseFactory,
} from "../collaborators/warehouse.js";
import type { GateConfig } from "../config/config.js";
import { ToolDispatcher } from "../dispatch/dispatcher.js";
import { createActionHandlers } from "../dispatch/handlers.js";
import { loggingMiddleware, usageMiddleware } from "../dispatch/middleware.js";
import { componentLogger, createLogger } from "../logging/logger.js";
import { SessionRegistry } from "../session/registry.js";

export interface AppContext {
  config: GateConfig;
  logger: Logger;
  registry: SessionRegistry;
  connections: ConnectionCatalog;
  warehouses: WarehouseManager;
  knowledge: KnowledgeBase;
  docs: DocumentationSearch;
  generator: ConfigGenerator;
  ledger: UsageLedger | null;
  usage: UsageTracker;
  dispatcher: ToolDispatcher;
}

export interface AppContextOverrides {
  logger?: Logger;
  docs?: DocumentationSearch;
  warehouseFactory?: WarehouseFactory;
  clock?: () => Date;
}

export function createAppContext(
  config: GateConfig,
  overrides: AppContextOverrides = {},
): AppContext {
  const logger = overrides.logger ?? createLogger(config.logLevel);
  const registry = new SessionRegistry({ clock: overrides.clock });
  const connections = new ConnectionCatalog(config.connectionsFile);
  const warehouses = new WarehouseManager(overrides.warehouseFactory ?? createWarehouse);
  const knowledge = new KnowledgeBase(config.knowledgeDir);
  const docs =
    overrides.docs ??
    (config.docsSearchUrl
      ? new HttpDocumentationSearch({
          baseUrl: config.docsSearchUrl,
          token: config.docsSearchToken,
        })
      : new UnconfiguredDocumentationSearch());
  const generator = new YamlConfigGenerator();

  const ledger = config.usageTracking ? new UsageLedger(config.usageDbPath) : null;
  const usage = new UsageTracker(ledger, componentLogger(logger, "usage"));

  const dispatcher = new ToolDispatcher({
    registry,
    handlers: createActionHandlers({ connections, warehouses, docs, generator }),
    middleware: [
      loggingMiddleware(componentLogger(logger, "dispatch")),
      usageMiddleware(usage),
    ],
  });

  return {
    config,
    logger,
    registry,
    connections,
    warehouses,
    knowledge,
    docs,
    generator,
    ledger,
    usage,
    dispatcher,
  };
}

export function closeAppContext(ctx: AppContext): void {
  ctx.warehouses.closeAll();
  ctx.ledger?.close();
}
