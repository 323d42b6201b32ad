import dotenv from 'dotenv';
import { loadConfig } from './config';
import { createApp } from './server';
import { createScheduleStore } from './storage/scheduleStore';

dotenv.config();

const main = async () => {
  const config = loadConfig();
  const store = createScheduleStore(config.dataFile, config.timeZone);
  await store.init();

  const app = createApp({ config, store });

  app.listen(config.port, config.host, () => {
    console.log(`✅ Server running on http://${config.host}:${config.port}`);
    console.log(`🕒 Schedule time zone: ${config.timeZone}`);
    console.log(`📄 Schedule file: ${config.dataFile}`);
  });
};

void main().catch((error) => {
  console.error('❌ Failed to start server:', error);
  process.exit(1);
});
