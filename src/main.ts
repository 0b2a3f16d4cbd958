import { loadConfig } from './common/config.js';
import { getErrorMessage, log, setLogLevel } from './common/logger.js';
import { startServer } from './core/server.js';

try {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  startServer({
    host: config.host,
    port: config.port,
    contextPath: config.contextPath,
  });
} catch (error) {
  log('ERROR', `Failed to start: ${getErrorMessage(error)}`);
  process.exitCode = 1;
}
