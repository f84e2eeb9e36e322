import 'dotenv/config';
import logger from './logger';
import { loadSettings } from './config/settings';
import { createServices } from './services';
import { createApp } from './app';

async function runServer() {
  try {
    const settings = loadSettings();
    const services = createServices(settings);
    const report = await services.orchestrator.initialize({ fetchRemote: settings.refreshRemoteOnStart });
    if (report?.status === 'failed') {
      logger.warn(`[REFRESH] Initial catalog load failed: ${report.reason}`);
    }

    const { app } = await createApp(services);
    app.listen(settings.port, () => {
      logger.info(`Server running on port ${settings.port}`);
      logger.info(`GraphQL endpoint available at http://localhost:${settings.port}/graphql`);
    });
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
}

runServer();
