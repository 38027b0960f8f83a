import { buildApp } from "@/app.js";
import { env } from "@/config/env.js";
import { logger } from "@/config/logger.js";
import { closeMongo } from "@/db/mongodb.js";

const app = await buildApp();

async function shutdown(signal: string) {
  logger.info({ signal }, "server-stopping");
  await app.close();
  await closeMongo();
  process.exit(0);
}

function onSignal(signal: string) {
  shutdown(signal).catch((error: unknown) => {
    logger.error({ error }, "server-stop-failed");
    process.exit(1);
  });
}

process.on("SIGINT", onSignal);
process.on("SIGTERM", onSignal);

try {
  await app.listen({ host: "0.0.0.0", port: env.PORT });
  logger.info({ port: env.PORT, store: env.POOL_STORE }, "server-started");
} catch (error) {
  logger.error({ error }, "server-start-failed");
  process.exit(1);
}
