import { z } from "zod";

/**
 * Severity levels, lowest first. A level's position in this list is its rank:
 * filtering compares ranks, never names.
 */
export const LEVELS = ["debug", "info", "success", "warning", "error"] as const;

export type Level = (typeof LEVELS)[number];

export const LevelSchema = z.enum(LEVELS);

export function levelRank(level: Level): number {
  return LEVELS.indexOf(level);
}

export function isAtLeast(level: Level, minimum: Level): boolean {
  return levelRank(level) >= levelRank(minimum);
}

// Wire shape. The level travels by name only; ordinals are never accepted.
export const FlashMessageRecord = z
  .object({
    content: z.string(),
    level: LevelSchema,
  })
  .strict();

export type FlashMessageRecord = z.infer<typeof FlashMessageRecord>;

export const FlashMessageList = z.array(FlashMessageRecord);

/**
 * A one-time user notification.
 *
 * The level drives filtering (see `FlashMessagesFramework`'s minimum level) and,
 * by convention, rendering: red for `error`, orange for `warning`, and so on.
 */
export class FlashMessage {
  readonly content: string;
  readonly level: Level;

  constructor(content: string, level: Level) {
    this.content = content;
    this.level = level;
    Object.freeze(this);
  }

  /** Development-related messages. Often ignored in production. */
  static debug(content: string): FlashMessage {
    return new FlashMessage(content, "debug");
  }

  /** Informational messages, e.g. "Your last login was two days ago". */
  static info(content: string): FlashMessage {
    return new FlashMessage(content, "info");
  }

  /** Positive feedback after an action succeeded, e.g. "You logged in successfully!". */
  static success(content: string): FlashMessage {
    return new FlashMessage(content, "success");
  }

  /** Something the user must act on soon to prevent an error later. */
  static warning(content: string): FlashMessage {
    return new FlashMessage(content, "warning");
  }

  /** An action was not successful, e.g. "The provided credentials are invalid". */
  static error(content: string): FlashMessage {
    return new FlashMessage(content, "error");
  }

  static fromJSON(value: unknown): FlashMessage {
    const record = FlashMessageRecord.parse(value);
    return new FlashMessage(record.content, record.level);
  }

  toJSON(): FlashMessageRecord {
    return { content: this.content, level: this.level };
  }

  toString(): string {
    return `${this.content} - ${this.level}`;
  }
}

/**
 * Validates an untrusted list of `{ content, level }` records and rebuilds the
 * messages in their original order. Throws a `ZodError` on any mismatch.
 */
export function parseFlashMessages(value: unknown): FlashMessage[] {
  return FlashMessageList.parse(value).map(
    (record) => new FlashMessage(record.content, record.level)
  );
}

export function toRecords(messages: readonly FlashMessage[]): FlashMessageRecord[] {
  return messages.map((message) => message.toJSON());
}
