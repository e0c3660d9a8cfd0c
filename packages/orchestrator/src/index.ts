import http from 'http';
import { join } from 'path';
import dotenv from 'dotenv';
import { ContactRecordSchema, DocumentRecordSchema } from './contracts/index.js';
import { getEnvConfig, type EnvConfig } from './config/env.js';
import { Orchestrator } from './agent/orchestrator.js';
import type { InterruptNotifier } from './messaging/reviewerFeed.js';
import { ReviewerFeed } from './messaging/reviewerFeed.js';
import { FileDeliveryLedger } from './messaging/outbox.js';
import { FileCheckpointStore } from './persistence/checkpoints.js';
import { InMemoryCalendar, loadCalendarSeed } from './calendar/service.js';
import { createClassifier } from './services/classifier.js';
import { InMemoryDirectory, loadRecords } from './services/directory.js';
import { LogMailTransport } from './services/mail.js';
import { createApp } from './app.js';
import { logger, setLogLevel } from './logging/logger.js';

export { createApp } from './app.js';
export { Orchestrator, type RunResult } from './agent/orchestrator.js';

/**
 * Wire the engine's collaborators from configuration.
 */
export function buildEngine(config: EnvConfig, notifier?: InterruptNotifier): Orchestrator {
  const contacts = loadRecords(config.DIRECTORY_FILE, ContactRecordSchema);
  const documents = loadRecords(config.DOCUMENTS_FILE, DocumentRecordSchema);

  return new Orchestrator({
    classifier: createClassifier({
      provider: config.CLASSIFIER_PROVIDER,
      url: config.CLASSIFIER_URL,
      apiKey: config.CLASSIFIER_API_KEY,
      timeoutMs: config.CLASSIFIER_TIMEOUT_MS,
    }),
    calendar: new InMemoryCalendar(config.CALENDAR_FILE ? loadCalendarSeed(config.CALENDAR_FILE) : []),
    mail: new LogMailTransport(),
    contacts: new InMemoryDirectory(contacts, (c) => `${c.name} ${c.email} ${c.role ?? ''} ${c.organisation ?? ''} ${c.notes}`),
    documents: new InMemoryDirectory(documents, (d) => `${d.title} ${d.tags.join(' ')} ${d.content}`),
    checkpoints: new FileCheckpointStore(join(config.DATA_DIR, 'conversations')),
    ledger: new FileDeliveryLedger(join(config.DATA_DIR, 'ledger')),
    notifier,
    settings: {
      mailbox: config.MAILBOX_ADDRESS,
      reviewTimeoutSeconds: config.REVIEW_TIMEOUT_SECONDS,
      bookingReviewTimeoutSeconds: config.BOOKING_REVIEW_TIMEOUT_SECONDS,
      businessHours: { startHour: config.BUSINESS_HOURS_START, endHour: config.BUSINESS_HOURS_END },
      maxRouteVisits: config.MAX_ROUTE_VISITS,
    },
  });
}

export async function main(): Promise<void> {
  dotenv.config();

  // Configuration and seed data problems stop the process before any conversation exists
  const config = getEnvConfig();
  setLogLevel(config.LOG_LEVEL);
  const server = http.createServer();
  const feed = new ReviewerFeed(server, config.GIT_SHA);
  const engine = buildEngine(config, feed);
  server.on('request', createApp(engine, { sha: config.GIT_SHA }));

  const sweep = setInterval(() => {
    engine.expireOverdue().catch((error: unknown) => {
      logger.error({ msg: 'expiry_sweep_failed', err: error });
    });
  }, config.EXPIRY_SWEEP_MS);
  sweep.unref();

  const shutdown = (signal: string) => {
    logger.info({ msg: 'server_stopping', signal });
    clearInterval(sweep);
    feed
      .close()
      .then(() => server.close())
      .catch((error: unknown) => logger.error({ msg: 'shutdown_failed', err: error }));
  };
  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));

  await new Promise<void>((resolve) => {
    server.listen(config.PORT, () => {
      logger.info({ msg: 'server_started', port: config.PORT, classifier: config.CLASSIFIER_PROVIDER });
      resolve();
    });
  });
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.fatal({ msg: 'bootstrap_failed', err: error });
    process.exit(1);
  });
}
