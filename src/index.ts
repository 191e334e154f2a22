import { loadSirenConfig } from "./config/siren_config";
import { createLogger } from "./logging/logger";
import { createSirenRuntime } from "./runtime";
import { buildServer } from "./server";

const log = createLogger({ component: "main" });

async function main() {
  const config = loadSirenConfig();
  const runtime = await createSirenRuntime(config);
  const app = buildServer(runtime, { logger: true });

  const shutdown = (signal: string) => {
    log.info({ evt: "server.shutdown", signal }, "server.shutdown");
    app
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error({ evt: "server.shutdown_failed", error: String(err) }, "server.shutdown_failed");
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  await app.listen({ port: config.server.port, host: config.server.host });
  log.info(
    { evt: "server.listening", port: config.server.port, profile: config.profile },
    "server.listening"
  );
}

main().catch((err: unknown) => {
  log.error({ evt: "server.start_failed", error: String(err) }, "server.start_failed");
  process.exit(1);
});
