import type { FlashMessage, Level } from "./message";

/** Flash messages attached to the incoming request. Read-only. */
export class IncomingFlashMessages implements Iterable<FlashMessage> {
  private readonly messages: readonly FlashMessage[];

  constructor(messages: readonly FlashMessage[]) {
    this.messages = Object.freeze([...messages]);
  }

  static empty(): IncomingFlashMessages {
    return new IncomingFlashMessages([]);
  }

  get length(): number {
    return this.messages.length;
  }

  all(): readonly FlashMessage[] {
    return this.messages;
  }

  byLevel(level: Level): FlashMessage[] {
    return this.messages.filter((message) => message.level === level);
  }

  [Symbol.iterator](): Iterator<FlashMessage> {
    return this.messages[Symbol.iterator]();
  }
}
