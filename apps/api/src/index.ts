import { createApp } from './app.js';
import { config } from './lib/config.js';

async function main(): Promise<void> {
  const app = await createApp({ logger: true });

  try {
    await app.listen({ port: config.port, host: config.host });
  } catch (err: unknown) {
    app.log.error(String(err));
    process.exit(1);
  }
}

void main();
