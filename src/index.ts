import 'dotenv/config';
import { createApp } from './app';
import { getConfig } from './utils/config/config';
import { log } from './utils/log/logger';

const { port, host, dataDir } = getConfig();

// Start server
createApp().listen(port, host, () => {
  log(`Server is running on ${host}:${port}`, { dataDir });
});
