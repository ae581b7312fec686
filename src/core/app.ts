import type { Plugin } from "./plugin";
import type { Logger } from "../domains/observability/types";
import { rootLogger } from "../domains/observability/logger";

export class Application {
  private plugins: Map<string, Plugin> = new Map();
  private logger: Logger;

  constructor(logger: Logger = rootLogger) {
    this.logger = logger.child({ component: "Core" });
  }

  async use(plugin: Plugin) {
    if (this.plugins.has(plugin.name)) {
      throw new Error(`Plugin ${plugin.name} is already registered.`);
    }
    await plugin.setup(this);
    this.plugins.set(plugin.name, plugin);
    this.logger.debug(`Plugin registered: ${plugin.name}`);
    return this;
  }

  has(name: string): boolean {
    return this.plugins.has(name);
  }

  async start() {
    this.logger.info("Application starting...");
    for (const plugin of this.plugins.values()) {
      if (plugin.start) {
        await plugin.start();
      }
    }
    this.logger.info("Application started successfully.");
  }

  // Reverse registration order: the server goes down before the link it serves.
  async stop() {
    this.logger.info("Application stopping...");
    const plugins = Array.from(this.plugins.values()).reverse();
    for (const plugin of plugins) {
      if (plugin.stop) {
        try {
          await plugin.stop();
        } catch (e) {
          this.logger.error(`Plugin ${plugin.name} failed to stop`, e);
        }
      }
    }
    this.logger.info("Application stopped.");
  }
}
