import { Application } from "./core/app";
import { BridgePlugin } from "./domains/bridge/bridge.plugin";
import { loadConfig } from "./domains/config/config";
import { rootLogger } from "./domains/observability/logger";
import { ServerPlugin } from "./domains/server/server.plugin";

async function bootstrap() {
  const loaded = loadConfig(process.env);
  if (!loaded.success) {
    for (const issue of loaded.error.issues) {
      rootLogger.error(`Invalid configuration: ${issue.path}: ${issue.message}`);
    }
    process.exit(1);
  }

  const { config, warnings } = loaded;
  rootLogger.configure({ level: config.logging.level, format: config.logging.format });
  for (const warning of warnings) rootLogger.warn(warning);

  rootLogger.info("Starting UART WebSocket Bridge", {
    serial: config.serial,
    http: config.http,
    websocket: config.websocket,
  });

  const app = new Application(rootLogger);
  const bridge = new BridgePlugin(config, undefined, rootLogger);
  await app.use(bridge);
  await app.use(new ServerPlugin(config, bridge.coordinator, rootLogger));

  await app.start();

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    rootLogger.info(`Received ${signal}, shutting down`);
    await app.stop();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

bootstrap().catch((error: unknown) => {
  rootLogger.error("Failed to start application", error);
  process.exit(1);
});
