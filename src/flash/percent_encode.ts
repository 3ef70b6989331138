// URL "userinfo" percent-encode set (https://url.spec.whatwg.org/#userinfo-percent-encode-set).
// Control characters and every non-ASCII byte are always escaped on top of these.
const FRAGMENT_SET = [" ", '"', "<", ">", "`"];
const PATH_SET = [...FRAGMENT_SET, "#", "?", "{", "}"];
const USERINFO_SET = [...PATH_SET, "/", ":", ";", "=", "@", "[", "\\", "]", "^", "|", "%"];

const ESCAPED_ASCII = new Set(USERINFO_SET.map((char) => char.charCodeAt(0)));

const needsEscape = (byte: number) => byte < 0x20 || byte >= 0x7f || ESCAPED_ASCII.has(byte);

const hex = (byte: number) => `%${byte.toString(16).toUpperCase().padStart(2, "0")}`;

/**
 * Percent-escapes a value so that it can be embedded in a `Set-Cookie` header.
 * Works on UTF-8 bytes; the output is plain ASCII and `decodeURIComponent`
 * reverses it exactly.
 */
export function escapeCookieValue(value: string): string {
  let out = "";
  for (const byte of Buffer.from(value, "utf8")) {
    out += needsEscape(byte) ? hex(byte) : String.fromCharCode(byte);
  }
  return out;
}

// Serialization hooks for @fastify/cookie: the value is escaped before the size
// check, so writing the cookie must not transform it again.
export const identityEncode = (value: string) => value;
