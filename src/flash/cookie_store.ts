import fastifyCookie from "@fastify/cookie";
import type { FastifyReply, FastifyRequest } from "fastify";
import { ZodError } from "zod";

import { LoadError, SizeLimitExceededError, StoreError } from "./errors";
import { type FlashMessage, parseFlashMessages, toRecords } from "./message";
import { escapeCookieValue, identityEncode } from "./percent_encode";
import type { FlashMessageStore } from "./store";

export const DEFAULT_COOKIE_NAME = "_flash";
export const DEFAULT_BYTES_SIZE_LIMIT = 2048;

export type SigningKey = string | Buffer;

// RFC 6265 cookie-name: an RFC 7230 token.
const COOKIE_NAME_TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

export type CookieMessageStoreOptions = {
  cookieName: string;
  signingKey: SigningKey;
  bytesSizeLimit: number;
  secure: boolean;
};

/**
 * Signed-cookie flash message storage.
 *
 * Outgoing messages are serialized to JSON, signed (HMAC-SHA256), then
 * percent-escaped. The size limit applies to that final escaped value, since it
 * is what the browser has to keep.
 */
export class CookieMessageStore implements FlashMessageStore {
  readonly cookieName: string;
  readonly bytesSizeLimit: number;
  readonly secure: boolean;
  private readonly signingKey: SigningKey;

  constructor(options: CookieMessageStoreOptions) {
    this.cookieName = options.cookieName;
    this.signingKey = options.signingKey;
    this.bytesSizeLimit = options.bytesSizeLimit;
    this.secure = options.secure;
  }

  static builder(signingKey: SigningKey): CookieMessageStoreBuilder {
    return new CookieMessageStoreBuilder(signingKey);
  }

  /** Serialize, sign and escape `messages` into a cookie value. */
  encode(messages: readonly FlashMessage[]): string {
    let serialized: string;
    try {
      serialized = JSON.stringify(toRecords(messages));
    } catch (error) {
      throw new StoreError("serialization", { cause: error });
    }

    // Sign first, escape second: the signature covers the raw JSON.
    const signed = fastifyCookie.sign(serialized, this.signingKey);
    const escaped = escapeCookieValue(signed);
    if (escaped.length > this.bytesSizeLimit) {
      throw new SizeLimitExceededError(this.bytesSizeLimit, escaped.length);
    }
    return escaped;
  }

  /** Verify and deserialize an (already percent-decoded) cookie value. */
  decode(value: string): FlashMessage[] {
    const unsigned = fastifyCookie.unsign(value, this.signingKey);
    if (!unsigned.valid) {
      throw new LoadError("integrity_check_failed", {
        cause: new Error(
          `Signature validation failed for the cookie storing incoming flash messages (${this.cookieName})`
        ),
      });
    }

    try {
      return parseFlashMessages(JSON.parse(unsigned.value));
    } catch (error) {
      if (error instanceof SyntaxError || error instanceof ZodError) {
        throw new LoadError("deserialization", { cause: error });
      }
      throw new LoadError("generic", { cause: error });
    }
  }

  async load(request: FastifyRequest): Promise<FlashMessage[]> {
    const header = request.headers.cookie;
    if (!header) return [];

    const value = fastifyCookie.parse(header)[this.cookieName];
    if (value === undefined) return [];
    return this.decode(value);
  }

  async store(
    messages: readonly FlashMessage[],
    _request: FastifyRequest,
    reply: FastifyReply
  ): Promise<void> {
    if (messages.length === 0) {
      // Deletion cookie, sent even when the request carried no flash cookie.
      this.appendCookie(reply, "", { maxAge: 0, path: "/" });
      return;
    }

    const value = this.encode(messages);
    this.appendCookie(reply, value, {
      httpOnly: true,
      sameSite: "lax",
      secure: this.secure,
      path: "/",
    });
  }

  private appendCookie(
    reply: FastifyReply,
    value: string,
    options: { maxAge?: number; path: string; httpOnly?: boolean; sameSite?: "lax"; secure?: boolean }
  ): void {
    let header: string;
    try {
      header = fastifyCookie.serialize(this.cookieName, value, { ...options, encode: identityEncode });
    } catch (error) {
      throw new StoreError("generic", { cause: error });
    }
    reply.header("set-cookie", header);
  }
}

/** Fluent configuration for `CookieMessageStore`. Only the signing key is required. */
export class CookieMessageStoreBuilder {
  private name = DEFAULT_COOKIE_NAME;
  private sizeLimit = DEFAULT_BYTES_SIZE_LIMIT;
  private secureFlag = true;

  constructor(private readonly signingKey: SigningKey) {
    if (signingKey.length === 0) {
      throw new TypeError("CookieMessageStore requires a non-empty signing key");
    }
  }

  /** Defaults to `_flash`. */
  cookieName(name: string): this {
    if (name.length === 0) throw new TypeError("Flash cookie name cannot be empty");
    if (!COOKIE_NAME_TOKEN.test(name)) {
      throw new TypeError(`Flash cookie name must be a cookie token, got ${JSON.stringify(name)}`);
    }
    this.name = name;
    return this;
  }

  /**
   * Defaults to 2048 bytes: broadly compatible across browsers while leaving
   * room for other cookies on the same response.
   */
  bytesSizeLimit(limit: number): this {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new RangeError(`Flash cookie size limit must be a positive integer, got ${limit}`);
    }
    this.sizeLimit = limit;
    return this;
  }

  /** Defaults to `true`. */
  secure(secure: boolean): this {
    this.secureFlag = secure;
    return this;
  }

  build(): CookieMessageStore {
    return new CookieMessageStore({
      cookieName: this.name,
      signingKey: this.signingKey,
      bytesSizeLimit: this.sizeLimit,
      secure: this.secureFlag,
    });
  }
}
