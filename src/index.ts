import { config as loadEnv } from "dotenv";

import { buildApp } from "./app";
import { loadTurnConfig } from "./control-plane/turn_config";
import { createLogger } from "./observability/logger";

if (process.env.NODE_ENV !== "production") {
  loadEnv();
}

async function main() {
  // Throws on a bad environment or a capacity ceiling below the viable minimum.
  const config = loadTurnConfig();
  const logger = createLogger({ level: config.server.logLevel, pretty: config.server.prettyLogs });

  const { app } = buildApp({ config, logger });

  logger.info(
    {
      capacityCeiling: config.capacityCeiling,
      provider: config.provider.kind,
      tokenizer: config.tokenizer,
    },
    "server.config"
  );

  await app.listen({ port: config.server.port, host: "0.0.0.0" });
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
