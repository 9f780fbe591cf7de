// imagegate HTTP API — process entry point

import { pino } from 'pino';
import { ImageGateEngine, loadConfig } from '@imagegate/core';
import { VERSION, buildServer } from './server.js';

const log = pino({ name: 'imagegate-api', level: process.env['IMAGEGATE_LOG_LEVEL'] ?? 'info' });

const config = loadConfig();
const engine = new ImageGateEngine({ config, logger: log.child({ component: 'engine' }) });
const server = await buildServer({ engine, loggerInstance: log });

// ── Start ─────────────────────────────────────────────────────────────────────

const port = parseInt(process.env['PORT'] ?? '3000', 10);

server.listen({ port, host: '0.0.0.0' }, (err) => {
  if (err) {
    server.log.error(err);
    process.exit(1);
  }
  server.log.info(
    { port, adoption: engine.adoptionStrategies() },
    `imagegate API v${VERSION} listening on http://0.0.0.0:${port}`,
  );
});
