import type { FastifyPluginAsync, FastifyRequest } from "fastify";
import fp from "fastify-plugin";

import { FlashMailboxMissingError, LoadError, StoreError } from "./errors";
import type { FlashMessagesFramework } from "./framework";
import { IncomingFlashMessages } from "./incoming";
import { OutgoingMailbox } from "./mailbox";
import { FlashMessage } from "./message";

/**
 * What a handler sees as `request.flash`: the messages that arrived with the
 * request and the mailbox for the ones that should reach the next request.
 */
export class FlashContext {
  private readonly mailbox: OutgoingMailbox;
  private loaded: IncomingFlashMessages | null = null;

  constructor(mailbox: OutgoingMailbox) {
    this.mailbox = mailbox;
  }

  /** Flash messages sent by the previous response. Available from `preHandler` on. */
  get incoming(): IncomingFlashMessages {
    if (!this.loaded) {
      throw new Error(
        "Incoming flash messages are not loaded yet: they become available in the preHandler stage of the request."
      );
    }
    return this.loaded;
  }

  get minimumLevel() {
    return this.mailbox.minimumLevel;
  }

  get isFlushed(): boolean {
    return this.mailbox.isClosed;
  }

  /** Queue a message for the next request. Returns `false` if it was filtered out. */
  send(message: FlashMessage): boolean {
    return this.mailbox.send(message);
  }

  debug(content: string): boolean {
    return this.send(FlashMessage.debug(content));
  }

  info(content: string): boolean {
    return this.send(FlashMessage.info(content));
  }

  success(content: string): boolean {
    return this.send(FlashMessage.success(content));
  }

  warning(content: string): boolean {
    return this.send(FlashMessage.warning(content));
  }

  error(content: string): boolean {
    return this.send(FlashMessage.error(content));
  }

  pending(): readonly FlashMessage[] {
    return this.mailbox.messages();
  }

  receive(messages: readonly FlashMessage[]): void {
    this.loaded = new IncomingFlashMessages(messages);
  }

  flush(): readonly FlashMessage[] {
    return this.mailbox.close();
  }
}

declare module "fastify" {
  interface FastifyRequest {
    flash: FlashContext;
  }
}

export type FlashPluginOptions = {
  framework: FlashMessagesFramework;
};

const requireContext = (request: FastifyRequest, operation: string): FlashContext => {
  // The decoration is typed as always present; it is not when the plugin is missing.
  if (!request.flash) throw new FlashMailboxMissingError(operation);
  return request.flash;
};

/** Attach `message` to the outgoing response of `request`. */
export function sendFlash(request: FastifyRequest, message: FlashMessage): boolean {
  return requireContext(request, "send flash message").send(message);
}

export function incomingFlashMessages(request: FastifyRequest): IncomingFlashMessages {
  return requireContext(request, "retrieve incoming flash messages").incoming;
}

const flashPlugin: FastifyPluginAsync<FlashPluginOptions> = async (app, opts) => {
  const { store, minimumLevel } = opts.framework;

  app.decorateRequest("flash", null);

  app.addHook("onRequest", async (request) => {
    request.flash = new FlashContext(new OutgoingMailbox(minimumLevel));
  });

  app.addHook("preHandler", async (request, reply) => {
    let messages: FlashMessage[];
    try {
      messages = await store.load(request);
    } catch (error) {
      const loadError = error instanceof LoadError ? error : new LoadError("generic", { cause: error });
      request.log.warn(
        { plane: "flash", code: loadError.code, cause: String(loadError.cause) },
        "flash.load_failed"
      );
      reply.code(loadError.statusCode);
      throw loadError;
    }

    request.flash.receive(messages);
    request.log.debug(
      { plane: "flash", incoming: messages.length, levels: messages.map((m) => m.level) },
      "flash.load"
    );
  });

  app.addHook("onSend", async (request, reply, payload) => {
    const context = request.flash;
    // Flushed already: this is the error reply produced by a failed flush.
    if (!context || context.isFlushed) return payload;

    const outgoing = context.flush();
    try {
      await store.store(outgoing, request, reply);
    } catch (error) {
      const storeError = error instanceof StoreError ? error : new StoreError("generic", { cause: error });
      request.log.error(
        { plane: "flash", code: storeError.code, outgoing: outgoing.length, cause: String(storeError.cause) },
        "flash.store_failed"
      );
      // The handler may already have picked a status (e.g. a redirect).
      reply.code(storeError.statusCode);
      throw storeError;
    }

    request.log.debug({ plane: "flash", outgoing: outgoing.length }, "flash.store");
    return payload;
  });

  // Anything that is not a flash error falls through to the parent handler.
  app.setErrorHandler((error, _request, reply) => {
    if (error instanceof LoadError || error instanceof StoreError) {
      reply.code(error.statusCode).send(error.toJSON());
      return;
    }
    throw error;
  });
};

/**
 * Fastify plugin wiring flash messages into the request lifecycle:
 * `onRequest` opens the mailbox, `preHandler` loads incoming messages, `onSend`
 * flushes the mailbox through the storage backend exactly once.
 *
 * Flash load and store failures are answered with their `toJSON()` body; other
 * errors are passed on to Fastify's default error handler.
 *
 * When using the session backend, register this plugin before @fastify/session
 * so the flush happens before the session is saved.
 */
export const flashMessages = fp(flashPlugin, {
  name: "flash-mailbox",
  fastify: "4.x",
});
