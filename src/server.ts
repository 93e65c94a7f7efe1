import 'dotenv/config';
import { createApp } from './api/app.js';
import { loadConfig } from './config.js';
import { InMemoryApproverDirectory } from './domain/directory.js';
import { WorkflowEngine } from './domain/engine.js';
import { QueryFacade } from './domain/query.js';
import { InMemoryWorkRequestRepository } from './domain/repository.js';
import { RoutingEngine } from './domain/routing.js';
import { WorkflowScheduler } from './domain/scheduler.js';
import { SlaTracker } from './domain/sla.js';
import { log, setLogLevel } from './observability/logger.js';

const config = loadConfig();
setLogLevel(config.logLevel);

const directory = new InMemoryApproverDirectory();
const routing = new RoutingEngine(directory);
const repository = new InMemoryWorkRequestRepository();
const engine = new WorkflowEngine(repository, routing, { config: config.workflow });
const queries = new QueryFacade(repository, new SlaTracker(config.workflow.sla), routing);
const scheduler = new WorkflowScheduler(engine, queries, {
  intervalMs: config.sweepIntervalMs,
  reroutePending: config.reroutePending
});

const app = createApp({ engine, queries, registry: directory });

const server = app.listen(config.port, () => {
  log('INFO', 'custody workflow service listening', { port: config.port, logLevel: config.logLevel });
  scheduler.start();
});

function shutdown(signal: string): void {
  log('INFO', 'shutting down', { signal });
  scheduler.stop();
  server.close((error) => {
    if (error) {
      log('ERROR', 'server close failed', { error: error.message });
      process.exitCode = 1;
    }
  });
}

process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));
