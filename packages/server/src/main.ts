import 'dotenv/config';
import { loadConfig } from './config/env';
import { createServices } from './services';
import { buildServer } from './index';

const config = loadConfig();
const { orchestrator, health } = createServices(config);

const app = buildServer({
  jobs: orchestrator,
  health,
  uploadDir: config.uploadDir,
  maxUploadBytes: config.maxUploadBytes
});

app.listen({ port: config.port, host: config.host }, (err) => {
  if (err) {
    console.error('❌ Server failed to start:', err);
    process.exit(1);
  }
  console.log(`\n🚀 Server listening at http://${config.host}:${config.port}`);
});
