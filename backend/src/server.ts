import 'dotenv/config';
import { loadConfig } from './config.js';
import { createApp } from './app.js';
import { createBigQueryClient } from './warehouse.js';

const config = loadConfig();
const client = createBigQueryClient(config.warehouse);
const app = createApp({ client, config });

app.listen(config.port, () => {
  console.log(`[api] up on :${config.port} (${config.env}, project ${config.warehouse.projectId})`);
});
