import {
  createLogger,
  loadConfig,
  loadKeyMaterial,
  readEosKeys,
  FileOffsetStore,
  RedisOffsetStore,
  ActionMonitorClient,
  EosChainClient,
  createDbClient,
  ensureOutcomeTable,
  DrizzleOutcomeRepository,
  InMemoryOutcomeRepository,
} from './infrastructure/index.js';
import type { AppConfig, Sql } from './infrastructure/index.js';
import { App, EventProcessor } from './application/index.js';
import type { EventOutcomeRepository, OffsetStore } from './domain/index.js';
import { buildServer } from './interfaces/http/index.js';

async function openOffsetStore(config: AppConfig): Promise<OffsetStore> {
  if (config.OFFSET_STORE === 'redis') {
    return RedisOffsetStore.connect(config.REDIS_URL, config.OFFSET_REDIS_KEY);
  }
  return FileOffsetStore.open(config.OFFSET_FILE);
}

async function openOutcomeRepository(
  config: AppConfig,
): Promise<{ outcomes: EventOutcomeRepository; sql: Sql | null }> {
  if (config.DATABASE_URL === undefined) {
    return { outcomes: new InMemoryOutcomeRepository(), sql: null };
  }
  const { sql, db } = createDbClient(config.DATABASE_URL);
  await ensureOutcomeTable(sql);
  return { outcomes: new DrizzleOutcomeRepository(db), sql };
}

/**
 * Bootstrap.
 *
 * Order:
 * 1) Config + logger
 * 2) Key material and chain client
 * 3) Offset store and outcome table
 * 4) Broker client, processor, HTTP server
 * 5) App.run() until a signal or a fatal failure
 * 6) Close stores
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const log = createLogger(config.LOG_LEVEL);

  const keys = loadKeyMaterial({
    chainId: config.CHAIN_ID,
    casinoAccount: config.CASINO_ACCOUNT,
    depositPublicKey: config.DEPOSIT_PUBLIC_KEY,
    signidicePublicKey: config.SIGNIDICE_PUBLIC_KEY,
    rsaKeyBase64: config.RSA_KEY,
  });
  const chain = new EosChainClient({
    endpoint: config.CHAIN_URL,
    chainId: config.CHAIN_ID,
    privateKeys: await readEosKeys(config.EOS_KEYS_FILE),
  });
  log.info({ casinoAccount: keys.casinoAccount, chainUrl: config.CHAIN_URL }, 'Key material loaded');

  const offsets = await openOffsetStore(config);
  const { outcomes, sql } = await openOutcomeRepository(config);
  log.info(
    { offsetStore: config.OFFSET_STORE, outcomeStore: sql === null ? 'memory' : 'postgres' },
    'Stores ready',
  );

  const app = new App({
    settings: {
      host: config.HOST,
      port: config.PORT,
      topicId: config.TOPIC_ID,
      topicOffset: config.TOPIC_OFFSET,
      commitPolicy: config.COMMIT_POLICY,
      eventConcurrency: config.EVENT_CONCURRENCY,
    },
    server: buildServer({ chain, keys, logLevel: config.LOG_LEVEL }),
    broker: new ActionMonitorClient({ url: config.BROKER_URL, log: log.child({ component: 'broker' }) }),
    offsets,
    handler: new EventProcessor({ chain, keys, log: log.child({ component: 'processor' }), outcomes }),
    log,
  });

  try {
    await app.run();
  } finally {
    await offsets.close().catch((err: unknown) => {
      log.warn({ err }, 'Failed to close offset store');
    });
    if (sql !== null) {
      await sql.end().catch((err: unknown) => {
        log.warn({ err }, 'Failed to close database');
      });
    }
  }
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: casino-signer stopped',
    err,
  );

  process.exit(1);

});
