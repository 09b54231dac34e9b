/**
 * Entry point for the ESG preference engine.
 *
 * Loads configuration, the taxonomy, any engine overrides and a previous
 * priorities export, builds the conversation agenda and logs what a session
 * would start with.
 */

import { existsSync } from "node:fs";
import { resolve } from "node:path";

import {
  config,
  validateConfig,
  isLogLevel,
  ConfigError,
  DEFAULT_ENGINE_CONFIG,
  EngineConfigError,
  loadEngineConfigFile,
} from "./config/index.js";
import { initRunId, createLogger } from "./logging/index.js";
import { ConversationRouter } from "./conversation/index.js";
import { loadPriorities, PrioritiesFormatError } from "./priorities/index.js";
import {
  HierarchyIndex,
  loadTaxonomyFile,
  TaxonomyLoadError,
  TaxonomyStore,
} from "./taxonomy/index.js";

function main(): void {
  // Initialize run ID first
  const runId = initRunId();

  const logger = createLogger({
    level: isLogLevel(config.logLevel) ? config.logLevel : "info",
    file: config.logToFile,
  });

  try {
    validateConfig();

    logger.info("Application starting", { runId });
    logger.info("Configuration loaded", {
      env: config.env,
      debug: config.debug,
      logLevel: config.logLevel,
      appName: config.appName,
      taxonomyPath: config.taxonomyPath,
    });

    const engineConfig = config.engineConfigPath
      ? loadEngineConfigFile(resolve(config.engineConfigPath))
      : DEFAULT_ENGINE_CONFIG;

    const loaded = loadTaxonomyFile(resolve(config.taxonomyPath), { logger });
    const store = TaxonomyStore.create(loaded.records);
    const hierarchy = HierarchyIndex.fromStore(store);

    logger.info("Taxonomy loaded", { ...loaded.stats, ...hierarchy.summary() });

    const prioritiesPath = resolve(config.prioritiesPath);
    if (existsSync(prioritiesPath)) {
      const previous = loadPriorities(prioritiesPath);
      const unknown = previous.allIds().filter((id) => !store.has(id));
      logger.info("Previous priorities export found", {
        path: prioritiesPath,
        ...previous.summary(),
        notInTaxonomy: unknown.length,
      });
    }

    const router = ConversationRouter.create({ store, hierarchy, config: engineConfig, logger });
    logger.info("Conversation agenda ready", {
      sessionId: router.session.id,
      nodes: router.agenda.length,
      first: router.currentNode()?.id,
    });

    logger.info("Application initialized successfully");
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error("Configuration error", { message: err.message });
      process.exit(1);
    }
    if (err instanceof EngineConfigError || err instanceof TaxonomyLoadError) {
      logger.error(err.message, { details: err.format() });
      process.exit(1);
    }
    if (err instanceof PrioritiesFormatError) {
      logger.error("Priorities export is invalid", { message: err.message });
      process.exit(1);
    }
    throw err;
  }
}

main();
