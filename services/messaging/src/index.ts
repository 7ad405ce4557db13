import { features, logger } from '@relaypost/shared';
import { createApi } from './api.js';
import { loadConfig } from './config.js';
import { enqueueStandardJobs, createExecutorRegistry } from './configure.js';
import { createCrypto } from './crypto.js';
import { openDatabase } from './db.js';
import { createJobStore } from './job-store.js';
import { createKeyStore } from './key-store.js';
import { createMessageStore } from './message-store.js';
import { createOutbox } from './outbox.js';
import { createPoller } from './poller.js';
import { JobRunner } from './runner.js';
import { createServerClient } from './server-client.js';

const log = logger.child({ module: 'messaging-main' });

async function main() {
  const startedAt = Date.now();
  log.info({ mode: features.mode }, 'starting messaging service');

  const config = loadConfig();
  const db = openDatabase(config.dbPath);

  const keys = createKeyStore(db);
  const crypto = createCrypto(keys.ensure());
  log.info({ identityId: crypto.identityId }, 'identity loaded');

  const api = createServerClient({ baseUrl: config.serverUrl });
  const storage = createMessageStore(db);

  const runner = new JobRunner({
    store: createJobStore(db),
    executors: createExecutorRegistry(),
    dependencies: { api, storage, crypto, keys, now: Date.now },
    contexts: {
      attachmentUpload: { maxConcurrent: config.attachmentConcurrency },
      attachmentDownload: { maxConcurrent: config.attachmentConcurrency },
    },
    backoff: config.backoff,
  });

  runner.events.on('jobPermanentlyFailed', (job, reason) => {
    if (job.variant === 'messageSend') {
      log.error({ messageId: job.interactionId, threadId: job.threadId, reason }, 'message failed to send');
    }
  });

  enqueueStandardJobs(runner, { openGroupServer: config.serverUrl, pushToken: config.pushToken, now: Date.now() });
  await runner.launch();

  const poller = features.isEnabled('poller')
    ? createPoller({ api, storage, jobs: runner, identityId: crypto.identityId, intervalMs: config.pollIntervalMs })
    : undefined;
  poller?.start();

  const outbox = createOutbox({ storage, jobs: runner, identityId: crypto.identityId });
  const app = createApi({
    runner,
    outbox,
    storage,
    openGroupServer: config.serverUrl,
    authToken: config.authToken,
    startedAt,
  });
  const server = app.listen(config.port, () => {
    log.info({ port: config.port }, 'messaging API listening');
  });

  // Graceful shutdown
  const shutdown = async () => {
    log.info('shutting down');
    server.close();
    await poller?.stop();
    await runner.stopAll();
    db.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      log.error({ err }, 'shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  log.fatal({ err }, 'messaging service failed to start');
  process.exit(1);
});
