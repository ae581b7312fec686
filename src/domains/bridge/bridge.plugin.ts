import type { Plugin } from "../../core/plugin";
import type { Application } from "../../core/app";
import type { BridgeConfig } from "../config/config";
import { ClientRegistry } from "../clients/registry";
import { rootLogger } from "../observability/logger";
import type { Logger } from "../observability/types";
import { createSerialDriver } from "../serial/drivers/factory";
import type { SerialDriverFactory } from "../serial/drivers/types";
import { SerialLink } from "../serial/link";
import { BridgeCoordinator } from "./coordinator";

/**
 * Owns the long-lived bridge components: one SerialLink, one ClientRegistry and
 * the coordinator between them. Other plugins receive them by reference.
 */
export class BridgePlugin implements Plugin {
  readonly name = "bridge";
  public readonly link: SerialLink;
  public readonly registry: ClientRegistry;
  public readonly coordinator: BridgeCoordinator;
  private logger: Logger;

  constructor(config: BridgeConfig, createDriver: SerialDriverFactory = createSerialDriver, logger: Logger = rootLogger) {
    this.logger = logger.child({ component: "BridgePlugin" });
    this.link = new SerialLink(config.serial, createDriver, logger);
    this.registry = new ClientRegistry({ queueSize: config.websocket.queueSize }, logger);
    this.coordinator = new BridgeCoordinator(
      this.link,
      this.registry,
      { maxMessageSize: config.websocket.maxMessageSize },
      logger
    );

    this.link.events.on("status", ({ status, previous }) => {
      this.logger.debug(`Link status ${previous} → ${status}`);
    });
  }

  setup(_app: Application) {
    this.logger.debug("Setting up Bridge domain...");
  }

  async start() {
    await this.coordinator.start();
  }

  async stop() {
    await this.coordinator.stop();
  }
}
