import { createRuntime } from "@chanwatch/worker";
import { createApp } from "./app";

async function main() {
  const runtime = await createRuntime({ notify: false });
  const { config, logger } = runtime;
  const app = createApp({ matcher: runtime.matcher, store: runtime.store, logger });

  const server = app.listen(config.web.port, () => {
    logger.info(`Server running on http://localhost:${config.web.port}`);
  });

  const shutdown = () => {
    server.close(() => runtime.close());
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
