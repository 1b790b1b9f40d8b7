import { createServer } from 'http';
import { config } from './config';
import { createApp } from './app';
import { API_PREFIX } from '@shared/constants';
import { ReportingDesk } from '@core/desk';
import { HmacProofVerifier } from '@core/proof';
import { InMemorySealingService } from '@core/sealing';
import { LocalDecryptionOracle, startWorkers } from '@worker/index';
import { connectDatabase, type DatabaseHandle } from '@db/connection';
import { createLedgerJournal } from '@db/journal';

const sealing = new InMemorySealingService();
const oracle = new LocalDecryptionOracle(sealing, config.oracle.secret);

const desk = new ReportingDesk({
  authority: config.authority,
  sealing,
  transport: oracle,
  verifier: new HmacProofVerifier(config.oracle.secret),
  windows: config.windows,
});

desk.subscribe((event) => {
  console.warn(`[LEDGER] #${event.sequence} ${event.name}${event.reportId ? ` report=${event.reportId}` : ''}`);
});

let database: DatabaseHandle | null = null;
if (config.database.url) {
  database = connectDatabase(config.database.url);
  desk.subscribe(createLedgerJournal(database.db));
}

const app = createApp(desk, { clientUrl: config.clientUrl, logRequests: config.isDev });
const server = createServer(app);

const stopWorkers = startWorkers(desk, oracle, {
  oraclePollMs: config.oracle.pollMs,
  sweepIntervalMs: config.sweeper.intervalMs,
  sweeperPrincipal: config.sweeper.principal,
});

function shutdown(signal: string) {
  console.warn(`[SERVER] ${signal} received, shutting down`);
  stopWorkers();
  server.close(() => {
    const closing = database ? database.close() : Promise.resolve();
    closing
      .then(() => process.exit(0))
      .catch((err) => {
        console.error('[SERVER] Failed to close database:', err);
        process.exit(1);
      });
  });
  setTimeout(() => process.exit(1), 5000).unref();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

server.listen(config.port, () => {
  console.warn(`[SERVER] Confidential Reporting Desk API on port ${config.port}`);
  console.warn(`[SERVER] Authority: ${config.authority}`);
  console.warn(`[SERVER] Journal: ${database ? 'postgres' : 'disabled'}`);
  console.warn(`[SERVER] Health: http://localhost:${config.port}${API_PREFIX}/health`);
});

export { app, server, desk };
