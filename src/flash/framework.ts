import type { Level } from "./message";
import type { FlashMessageStore } from "./store";

export const DEFAULT_MINIMUM_LEVEL: Level = "info";

/**
 * Application-wide flash configuration: the storage backend plus the minimum
 * level below which outgoing messages are discarded. Built once at startup and
 * shared by every request.
 */
export type FlashMessagesFramework = {
  readonly store: FlashMessageStore;
  readonly minimumLevel: Level;
};

export class FlashMessagesFrameworkBuilder {
  private level: Level | undefined;

  constructor(private readonly backend: FlashMessageStore) {}

  /**
   * Defaults to `info`. Lower it to `debug` when developing locally to see
   * development-only messages.
   */
  minimumLevel(level: Level): this {
    this.level = level;
    return this;
  }

  build(): FlashMessagesFramework {
    return Object.freeze({
      store: this.backend,
      minimumLevel: this.level ?? DEFAULT_MINIMUM_LEVEL,
    });
  }
}

export const FlashMessagesFramework = {
  builder(store: FlashMessageStore): FlashMessagesFrameworkBuilder {
    return new FlashMessagesFrameworkBuilder(store);
  },
};
