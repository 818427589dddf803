import { log } from "./log.js";
import { config } from "./config.js";
import { buildServer } from "./server.js";
import { closeStore, openStore } from "./db.js";

const db = await openStore();
const app = buildServer({ db });

const shutdown = async (signal: string) => {
  log.info("shutdown", { signal });
  try {
    await app.close();
  } finally {
    await closeStore(db);
  }
};

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((error) => {
        log.error("shutdown.failed", { error });
        process.exit(1);
      });
  });
}

app
  .listen({ port: config.PORT, host: config.SERVICE_BIND_ADDRESS })
  .then((address) => {
    log.info("listening", { address });
  })
  .catch(async (error) => {
    log.error("failed to start", { error });
    await closeStore(db);
    process.exit(1);
  });
