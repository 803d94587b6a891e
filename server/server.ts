import 'dotenv/config';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createServices } from './services.js';

const config = loadConfig();
const services = createServices(config);
const app = createApp(services);

app.listen(config.port, '0.0.0.0', () => {
  console.log(`[server] Server running on http://localhost:${config.port}`);
  console.log(`[server] Data directory: ${config.dataDir}`);
  console.log(`[server] Bulk import allowed for: ${config.importRoles.join(', ')}`);
});
