import { FlashMailboxClosedError } from "./errors";
import { type FlashMessage, type Level, isAtLeast } from "./message";

/**
 * Per-request buffer of outgoing flash messages.
 *
 * Only messages at or above `minimumLevel` are admitted. Once `close()` has
 * handed the contents to the storage backend, any further `send` throws.
 */
export class OutgoingMailbox {
  readonly minimumLevel: Level;
  private readonly queued: FlashMessage[] = [];
  private closed = false;

  constructor(minimumLevel: Level) {
    this.minimumLevel = minimumLevel;
  }

  /** Returns `false` when the message was dropped by the level filter. */
  send(message: FlashMessage): boolean {
    if (this.closed) throw new FlashMailboxClosedError();
    if (!isAtLeast(message.level, this.minimumLevel)) return false;
    this.queued.push(message);
    return true;
  }

  messages(): readonly FlashMessage[] {
    return [...this.queued];
  }

  get isClosed(): boolean {
    return this.closed;
  }

  close(): readonly FlashMessage[] {
    this.closed = true;
    return this.messages();
  }
}
