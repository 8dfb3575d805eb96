import 'dotenv/config';
import { loadConfig } from './config/config';
import { createLogger } from './obs/logger';
import { createArtifactStore } from './persistence/fsStore';
import { createApp } from './app';

const config = loadConfig();
const logger = createLogger(config);
const store = createArtifactStore(config);

logger.info('Config loaded', {
  environment: config.environment,
  docsRoot: config.docs.docsRoot,
  repoSlug: config.docs.repoSlug,
  branch: config.docs.branch,
  persistence: config.persistence.mode,
});

const app = createApp({ config, logger, store });
const port = config.server.port;

app.listen(port, () => {
  logger.info('Server listening', { url: `http://localhost:${port}` });
});
