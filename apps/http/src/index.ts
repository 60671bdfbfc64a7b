// apps/http/src/index.ts
import { createLogger, loadConfig, redactConfig } from '@shadowsql/core';
import { createProposalSource } from '@shadowsql/llm';
import { MySqlShadowDatabase } from '@shadowsql/shadow-mysql';
import { buildApp } from './app';

async function main() {
  const config = loadConfig();
  const logger = createLogger({ level: config.logging.level, name: 'shadowsql-http' });

  const db = new MySqlShadowDatabase({
    uri: config.shadow_database.uri,
    isolation: config.shadow_database.isolation,
    connectionLimit: config.shadow_database.connection_limit,
    logger: logger.child({ component: 'shadow-mysql' })
  });
  const source = createProposalSource(config.llm, logger.child({ component: 'llm' }));

  const app = await buildApp({ config, db, source, logger });
  app.log.info({ config: redactConfig(config) }, 'effective-config');

  const onShutdown = async (signal: string) => {
    app.log.info({ signal }, 'shutting-down');
    try {
      await Promise.allSettled([app.close(), db.close()]);
    } finally {
      process.exit(0);
    }
  };
  process.on('SIGINT', () => void onShutdown('SIGINT'));
  process.on('SIGTERM', () => void onShutdown('SIGTERM'));

  await app.listen({ port: config.server.port, host: config.server.host });
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('Fatal boot error', err);
  process.exit(1);
});
