export type LoadErrorKind = "deserialization" | "integrity_check_failed" | "generic";

export type StoreErrorKind = "serialization" | "size_limit_exceeded" | "generic";

const LOAD_MESSAGES: Record<LoadErrorKind, string> = {
  deserialization: "Failed to deserialize incoming flash messages",
  integrity_check_failed:
    "The content of incoming flash messages failed a cryptographic integrity check (e.g. signature verification)",
  generic: "Something went wrong when extracting incoming flash messages",
};

const STORE_MESSAGES: Record<StoreErrorKind, string> = {
  serialization: "Failed to serialize outgoing flash messages",
  size_limit_exceeded: "Outgoing flash messages, when serialized, exceeded the store size limit",
  generic: "Something went wrong when flushing outgoing flash messages",
};

const describeCause = (cause: unknown): string | undefined => {
  if (cause instanceof Error) return cause.message;
  if (cause === undefined || cause === null) return undefined;
  return String(cause);
};

/**
 * Failure of `FlashMessageStore.load`.
 *
 * Incoming flash messages that cannot be read almost always mean a corrupted or
 * tampered payload sent by the client, so these surface as 400s.
 */
export class LoadError extends Error {
  public readonly kind: LoadErrorKind;
  public readonly code: string;
  public readonly statusCode = 400;

  constructor(kind: LoadErrorKind, options: { cause?: unknown } = {}) {
    super(LOAD_MESSAGES[kind], { cause: options.cause });
    this.name = "LoadError";
    this.kind = kind;
    this.code = `FLASH_LOAD_${kind.toUpperCase()}`;
  }

  toJSON() {
    return {
      error: "invalid_flash_messages",
      code: this.code,
      message: this.message,
      cause: describeCause(this.cause),
    };
  }
}

/**
 * Failure of `FlashMessageStore.store`: a server-side problem (size limit set
 * far too low, session backend unavailable). Surfaces as a 500.
 */
export class StoreError extends Error {
  public readonly kind: StoreErrorKind;
  public readonly code: string;
  public readonly statusCode = 500;

  constructor(kind: StoreErrorKind, options: { cause?: unknown } = {}) {
    super(STORE_MESSAGES[kind], { cause: options.cause });
    this.name = "StoreError";
    this.kind = kind;
    this.code = `FLASH_STORE_${kind.toUpperCase()}`;
  }

  toJSON() {
    return {
      error: "flash_store_failed",
      code: this.code,
      message: this.message,
      cause: describeCause(this.cause),
    };
  }
}

export class SizeLimitExceededError extends StoreError {
  public readonly limit: number;
  public readonly actual: number;

  constructor(limit: number, actual: number) {
    super("size_limit_exceeded", {
      cause: new Error(
        `The configured maximum cookie size, in bytes, is ${limit}. ` +
          `The serialized and signed outgoing flash messages are ${actual} bytes long.`
      ),
    });
    this.name = "SizeLimitExceededError";
    this.limit = limit;
    this.actual = actual;
  }
}

const MISSING_PLUGIN_HINT =
  "Register the `flashMessages` plugin on your Fastify instance (app.register(flashMessages, { framework })) " +
  "before any route that sends or reads flash messages.";

/** The flash plugin was never registered: a wiring mistake, not a data error. */
export class FlashMailboxMissingError extends Error {
  constructor(operation: string) {
    super(`Failed to ${operation}: no flash mailbox is attached to this request. ${MISSING_PLUGIN_HINT}`);
    this.name = "FlashMailboxMissingError";
  }
}

/** A message was sent after the response had already been flushed. */
export class FlashMailboxClosedError extends Error {
  constructor() {
    super(
      "Failed to send flash message: the outgoing mailbox for this request has already been flushed. " +
        "Flash messages must be sent before the response is sent."
    );
    this.name = "FlashMailboxClosedError";
  }
}
