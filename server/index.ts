import { createApp } from "./app.js";
import { buildCapabilities } from "./capabilities/index.js";
import { loadConfig } from "./config.js";
import { SessionStore } from "./domain/store.js";

async function start(): Promise<void> {
  const config = loadConfig();
  const store = new SessionStore({
    mode: config.sessionStore,
    dataPath: config.sessionDataPath,
    databaseUrl: config.databaseUrl,
    databaseSsl: config.databaseSsl
  });
  await store.init();

  const capabilities = await buildCapabilities(config);
  const app = createApp({ config, capabilities, store });

  const server = app.listen(config.port, () => {
    console.log(`Lead outreach workflows listening on http://localhost:${config.port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, closing server`);
    server.close(() => {
      store
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error(error);
          process.exit(1);
        });
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

start().catch((error) => {
  console.error(error);
  process.exit(1);
});
