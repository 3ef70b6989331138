import type { FastifyReply, FastifyRequest } from "fastify";

import type { FlashMessage } from "./message";

/**
 * How flash messages travel from one response to the next request.
 *
 * The package ships a signed-cookie backend (`CookieMessageStore`) and a
 * session backend (`SessionMessageStore`). Implement this interface to plug in
 * any other medium.
 */
export interface FlashMessageStore {
  /**
   * Extract the flash messages attached to an incoming request.
   * Resolves to an empty list when there are none; rejects with a `LoadError`.
   */
  load(request: FastifyRequest): Promise<FlashMessage[]>;

  /**
   * Attach `messages` to the outgoing response. An empty list must clear the
   * medium, otherwise already-delivered messages would be shown again.
   * Rejects with a `StoreError`.
   */
  store(
    messages: readonly FlashMessage[],
    request: FastifyRequest,
    reply: FastifyReply
  ): Promise<void>;
}
