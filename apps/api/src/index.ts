import { buildApp } from "./app.js";
import { loadAppConfig } from "./config/app-config.js";
import { loadDotenvFiles, loadEnv } from "./config/env.js";
import { createEngineContext } from "./context.js";
import { createLogger } from "./core/logger.js";

loadDotenvFiles();
const env = loadEnv();
const logger = createLogger(env.LOG_LEVEL);
const config = await loadAppConfig(env.BACKHAUL_CONFIG_FILE);
const context = await createEngineContext({ env, config, logger });
const app = await buildApp(context);

let closing = false;
const shutdown = (signal: NodeJS.Signals) => {
  if (closing) {
    return;
  }
  closing = true;
  app.log.info({ signal }, "Shutting down");
  app.close().then(
    () => process.exit(0),
    (error: unknown) => {
      app.log.error({ err: error }, "Shutdown failed");
      process.exit(1);
    }
  );
};
process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);

try {
  await app.listen({ port: env.API_PORT, host: env.API_HOST });
  if (env.WATCH_ON_START) {
    await context.watch.start();
  }
  app.log.info({ watchCount: context.watch.status().length, storageType: config.globalStorageType }, "Backhaul initialized");
} catch (err) {
  app.log.error(err);
  process.exit(1);
}
