export { FlashMessage, LEVELS, LevelSchema, isAtLeast, levelRank, parseFlashMessages } from "./message";
export type { Level, FlashMessageRecord } from "./message";
export type { FlashMessageStore } from "./store";
export {
  CookieMessageStore,
  CookieMessageStoreBuilder,
  DEFAULT_BYTES_SIZE_LIMIT,
  DEFAULT_COOKIE_NAME,
} from "./cookie_store";
export type { CookieMessageStoreOptions, SigningKey } from "./cookie_store";
export { SessionMessageStore, DEFAULT_SESSION_KEY, fastifySessionMap } from "./session_store";
export type { SessionMap } from "./session_store";
export { escapeCookieValue } from "./percent_encode";
export {
  LoadError,
  StoreError,
  SizeLimitExceededError,
  FlashMailboxMissingError,
  FlashMailboxClosedError,
} from "./errors";
export type { LoadErrorKind, StoreErrorKind } from "./errors";
export { OutgoingMailbox } from "./mailbox";
export { IncomingFlashMessages } from "./incoming";
export { FlashMessagesFramework, FlashMessagesFrameworkBuilder, DEFAULT_MINIMUM_LEVEL } from "./framework";
export { FlashContext, flashMessages, incomingFlashMessages, sendFlash } from "./plugin";
export type { FlashPluginOptions } from "./plugin";
