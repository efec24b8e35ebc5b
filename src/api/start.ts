import { loadConfig } from '../config';
import { createFarmRepository } from '../storage';
import { FarmService } from '../services/farm-service';
import { createApp } from './server';
import log, { setLogLevel } from '../utils/logger';

const config = loadConfig();
if (config.logLevel) {
  setLogLevel(config.logLevel);
}
const service = new FarmService(createFarmRepository(config.storage));
const app = createApp({ service, config });

app.listen(config.port, () => {
  log.startup(`Säljplaneraren körs på http://localhost:${config.port}`);
  log.startup(`API: http://localhost:${config.port}/api`);
  log.startup(`Dokumentation: http://localhost:${config.port}/api-docs`);
  log.startup(`Health: http://localhost:${config.port}/health`);
});
