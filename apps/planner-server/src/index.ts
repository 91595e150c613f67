import { loadSearchConfig, resolveSearchConfig } from '@waypoint/planning-core';
import { loadCatalog } from '@waypoint/travel-tools';
import { createChatModelAdapter } from './adapters/llm';
import { loadServerConfig } from './config';
import { createLogger } from './logging';
import { PlannerRuntime } from './runtime';
import { createPlannerHttpServer, SERVICE_NAME } from './server';

const config = loadServerConfig();
const logger = createLogger({ service: SERVICE_NAME }, { level: config.logLevel });
const runtime = new PlannerRuntime(logger, {
  catalog: config.catalogPath ? loadCatalog(config.catalogPath) : loadCatalog(),
  searchConfig: config.searchConfigPath ? loadSearchConfig(config.searchConfigPath) : resolveSearchConfig(),
  defaultHint: config.hint,
  llm: createChatModelAdapter(config, logger.child({ component: 'llm' })),
});

const server = createPlannerHttpServer(runtime, logger);

server.listen(config.port, () => {
  logger.info('server.started', { port: config.port, baseUrl: `http://localhost:${config.port}`, hint: config.hint });
});
