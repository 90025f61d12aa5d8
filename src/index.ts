import { loadConfig } from './env';
import { log } from './log';
import { buildServer } from './server';

const config = loadConfig();
log.level = config.logLevel;

const { server } = buildServer(config);

server.listen(config.port, () => {
  log.info({ port: config.port, host_url: config.hostUrl, static_dir: config.staticDir }, 'server listening');
});
