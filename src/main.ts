import { createRelayApp } from "./app.js";

export const main = async () => {
  const app = createRelayApp();
  await app.start();

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    app.logger.info({ signal }, "Shutting down...");
    try {
      await app.stop();
      process.exit(0);
    } catch (error) {
      app.logger.error({ error }, "shutdown failed");
      process.exit(1);
    }
  };

  process.on("SIGINT", () => {
    void shutdown("SIGINT");
  });
  process.on("SIGTERM", () => {
    void shutdown("SIGTERM");
  });
};
