import { buildServer } from './server';
import { HOST, LOG_LEVEL, PORT } from '../config/server';

const app = buildServer({ logger: { level: LOG_LEVEL } });

// Start server
const start = async () => {
  try {
    await app.listen({ port: PORT, host: HOST });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

void start();
