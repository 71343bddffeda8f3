import { buildApp } from './app.js';
import { loadConfig } from './config/index.js';
import { createRepositoryBundleFromConfig } from './infrastructure/repositories.js';

const config = loadConfig();
const repositories = createRepositoryBundleFromConfig(config);
const app = buildApp({ config, repositories });

process.on('unhandledRejection', reason => {
  app.log.fatal({ err: reason }, 'Unhandled rejection');
  process.exit(1);
});

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    app.log.info({ signal }, 'Shutting down');
    app.close().then(
      () => process.exit(0),
      err => {
        app.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  });
}

try {
  await app.listen({ port: config.server.port, host: config.server.host });
} catch (err) {
  app.log.error({ err }, 'Error starting server');
  process.exit(1);
}
