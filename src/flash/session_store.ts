/// <reference types="@fastify/session" />
import type { FastifyReply, FastifyRequest } from "fastify";
import { ZodError } from "zod";

import { LoadError, StoreError } from "./errors";
import { type FlashMessage, type FlashMessageRecord, parseFlashMessages, toRecords } from "./message";
import type { FlashMessageStore } from "./store";

export const DEFAULT_SESSION_KEY = "_flash";

/**
 * The slice of a session subsystem the session backend needs: a key-value map
 * bound to the session attached to a request.
 */
export interface SessionMap {
  get(request: FastifyRequest, key: string): unknown | Promise<unknown>;
  insert(request: FastifyRequest, key: string, value: FlashMessageRecord[]): void | Promise<void>;
  remove(request: FastifyRequest, key: string): void | Promise<void>;
}

declare module "fastify" {
  interface Session {
    [key: string]: unknown;
  }
}

const requireSession = (request: FastifyRequest) => {
  const session = request.session;
  if (!session) {
    throw new Error(
      "No session is attached to the request: register @fastify/session before reading or writing flash messages."
    );
  }
  return session;
};

/** `SessionMap` over `request.session`, as decorated by @fastify/session. */
export const fastifySessionMap: SessionMap = {
  get(request, key) {
    return requireSession(request).get(key);
  },
  insert(request, key, value) {
    requireSession(request).set(key, value);
  },
  remove(request, key) {
    // @fastify/session has no per-key delete; an undefined value is dropped when
    // the session is serialized and reads back as absent.
    requireSession(request).set(key, undefined);
  },
};

/**
 * Session-backed flash message storage: the message list lives in the request's
 * session under a single key.
 */
export class SessionMessageStore implements FlashMessageStore {
  readonly key: string;
  private readonly sessions: SessionMap;

  constructor(options: { key?: string; sessions?: SessionMap } = {}) {
    this.key = options.key ?? DEFAULT_SESSION_KEY;
    this.sessions = options.sessions ?? fastifySessionMap;
  }

  static withKey(key: string, sessions?: SessionMap): SessionMessageStore {
    return new SessionMessageStore({ key, sessions });
  }

  async load(request: FastifyRequest): Promise<FlashMessage[]> {
    let stored: unknown;
    try {
      stored = await this.sessions.get(request, this.key);
    } catch (error) {
      throw new LoadError("generic", {
        cause: new Error("Failed to retrieve flash messages from session storage.", { cause: error }),
      });
    }
    if (stored === undefined || stored === null) return [];

    try {
      return parseFlashMessages(stored);
    } catch (error) {
      if (error instanceof ZodError) {
        throw new LoadError("deserialization", { cause: error });
      }
      throw new LoadError("generic", { cause: error });
    }
  }

  async store(
    messages: readonly FlashMessage[],
    request: FastifyRequest,
    _reply: FastifyReply
  ): Promise<void> {
    try {
      if (messages.length === 0) {
        // Overwriting on the other branch already replaces stale messages.
        await this.sessions.remove(request, this.key);
      } else {
        await this.sessions.insert(request, this.key, toRecords(messages));
      }
    } catch (error) {
      throw new StoreError("generic", {
        cause: new Error("Failed to write flash messages to session storage.", { cause: error }),
      });
    }
  }
}
