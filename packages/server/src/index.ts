import { buildApp } from './app.js';
import { loadSettings } from './settings.js';

const settings = loadSettings();
const PORT = Number(process.env.PORT) || settings.server.port;
const HOST = process.env.HOST ?? settings.server.host;

const fastify = await buildApp({ settings });

// Start server
try {
  await fastify.listen({ port: PORT, host: HOST });
  console.log(`[server] filework engine running on http://${HOST}:${PORT}`);
  if (settings.defaultPath) {
    console.log(`[server] Default path: ${settings.defaultPath}`);
  }
} catch (err) {
  fastify.log.error(err);
  process.exit(1);
}
