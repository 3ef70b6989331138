import { describe, it, expect, beforeAll, afterAll } from "vitest";
import Fastify, { type FastifyInstance } from "fastify";
import fastifyCookie from "@fastify/cookie";

import { CookieMessageStore } from "../src/flash/cookie_store";
import {
  FlashMailboxClosedError,
  FlashMailboxMissingError,
  LoadError,
  StoreError,
} from "../src/flash/errors";
import { FlashMessagesFramework } from "../src/flash/framework";
import { FlashMessage } from "../src/flash/message";
import { flashMessages, incomingFlashMessages, sendFlash } from "../src/flash/plugin";
import type { FlashMessageStore } from "../src/flash/store";
import { escapeCookieValue } from "../src/flash/percent_encode";
import { findCookie, setCookies } from "./helpers/cookies";

const KEY = "test-secret-test-secret-test-secret";

const addDemoRoutes = (app: FastifyInstance) => {
  app.get("/show", async (req, reply) => {
    const body = [...req.flash.incoming].map((message) => `${message}\n`).join("");
    return reply.type("text/plain").send(body);
  });

  app.get("/set", async (req, reply) => {
    req.flash.info("Hey there!");
    req.flash.debug("How's it going?");
    return reply.code(303).header("location", "/show").send();
  });

  app.get("/boom", async (req) => {
    req.flash.error("Something broke");
    throw new Error("boom");
  });
};

const cookieApp = (bytesSizeLimit = 2048) => {
  const app = Fastify({ logger: false });
  const store = CookieMessageStore.builder(KEY)
    .cookieName("my-flash")
    .secure(false)
    .bytesSizeLimit(bytesSizeLimit)
    .build();
  app.register(flashMessages, { framework: FlashMessagesFramework.builder(store).build() });
  addDemoRoutes(app);
  return app;
};

describe("flash plugin with the cookie backend", () => {
  const app = cookieApp();

  beforeAll(async () => {
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it("delivers a message exactly once across a redirect", async () => {
    // No flash cookie yet: nothing to show, and the medium is cleared anyway.
    const first = await app.inject({ method: "GET", url: "/show" });
    expect(first.statusCode).toBe(200);
    expect(first.body).toBe("");
    const cleared = setCookies(first);
    expect(cleared).toHaveLength(1);
    expect(cleared[0].name).toBe("my-flash");
    expect(cleared[0].value).toBe("");
    expect(cleared[0].attributes.get("max-age")).toBe("0");

    // The debug message falls below the default `info` threshold.
    const set = await app.inject({ method: "GET", url: "/set" });
    expect(set.statusCode).toBe(303);
    const flash = findCookie(set, "my-flash");
    expect(flash?.value).toBe(
      escapeCookieValue(fastifyCookie.sign('[{"content":"Hey there!","level":"info"}]', KEY))
    );

    const shown = await app.inject({
      method: "GET",
      url: "/show",
      headers: { cookie: `my-flash=${flash?.value}` },
    });
    expect(shown.statusCode).toBe(200);
    expect(shown.body).toBe("Hey there! - info\n");
    const deletion = setCookies(shown);
    expect(deletion).toHaveLength(1);
    expect(deletion[0].value).toBe("");
    expect(deletion[0].attributes.get("max-age")).toBe("0");
    expect(deletion[0].attributes.get("path")).toBe("/");
  });

  it("answers 400 to a forged cookie and clears it on the same response", async () => {
    const forged = escapeCookieValue('[{"content":"Free money","level":"success"}].forged');
    const res = await app.inject({
      method: "GET",
      url: "/show",
      headers: { cookie: `my-flash=${forged}` },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: "invalid_flash_messages",
      code: "FLASH_LOAD_INTEGRITY_CHECK_FAILED",
      message: new LoadError("integrity_check_failed").message,
      cause: "Signature validation failed for the cookie storing incoming flash messages (my-flash)",
    });
    expect(findCookie(res, "my-flash")?.attributes.get("max-age")).toBe("0");
  });

  it("still flushes messages when the handler fails", async () => {
    const res = await app.inject({ method: "GET", url: "/boom" });

    expect(res.statusCode).toBe(500);
    expect(findCookie(res, "my-flash")?.value).toBe(
      escapeCookieValue(fastifyCookie.sign('[{"content":"Something broke","level":"error"}]', KEY))
    );
  });

  it("exposes incoming messages through the free function", async () => {
    const local = Fastify({ logger: false });
    local.register(flashMessages, {
      framework: FlashMessagesFramework.builder(CookieMessageStore.builder(KEY).build()).build(),
    });
    local.get("/count", async (req) => ({ count: incomingFlashMessages(req).length }));

    const value = CookieMessageStore.builder(KEY).build().encode([FlashMessage.info("a"), FlashMessage.info("b")]);
    const res = await local.inject({ method: "GET", url: "/count", headers: { cookie: `_flash=${value}` } });
    await local.close();

    expect(res.json()).toEqual({ count: 2 });
  });
});

describe("flash context inside a handler", () => {
  it("shows the queued messages and the threshold before the flush", async () => {
    const app = cookieApp();
    app.get("/peek", async (req) => {
      const acceptedDebug = req.flash.debug("Cache warmed");
      const acceptedWarning = req.flash.warning("Quota at 90%");
      return {
        acceptedDebug,
        acceptedWarning,
        minimumLevel: req.flash.minimumLevel,
        flushed: req.flash.isFlushed,
        pending: req.flash.pending().map((message) => message.toJSON()),
      };
    });

    const res = await app.inject({ method: "GET", url: "/peek" });
    await app.close();

    expect(res.json()).toEqual({
      acceptedDebug: false,
      acceptedWarning: true,
      minimumLevel: "info",
      flushed: false,
      pending: [{ content: "Quota at 90%", level: "warning" }],
    });
  });
});

describe("flash plugin store failures", () => {
  it("turns a size limit breach into a 500 without a partial cookie", async () => {
    const app = cookieApp(64);
    const res = await app.inject({ method: "GET", url: "/set" });
    await app.close();

    expect(res.statusCode).toBe(500);
    expect(res.json()).toMatchObject({
      error: "flash_store_failed",
      code: "FLASH_STORE_SIZE_LIMIT_EXCEEDED",
    });
    expect(res.json().cause).toMatch(/^The configured maximum cookie size, in bytes, is 64\. /);
    expect(findCookie(res, "my-flash")).toBeUndefined();
  });

  it("wraps custom backend failures and flushes only once", async () => {
    let storeCalls = 0;
    const brokenStore: FlashMessageStore = {
      async load() {
        return [];
      },
      async store() {
        storeCalls += 1;
        throw new Error("disk full");
      },
    };

    const app = Fastify({ logger: false });
    app.register(flashMessages, { framework: FlashMessagesFramework.builder(brokenStore).build() });
    addDemoRoutes(app);

    const res = await app.inject({ method: "GET", url: "/set" });
    await app.close();

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({
      error: "flash_store_failed",
      code: "FLASH_STORE_GENERIC",
      message: new StoreError("generic").message,
      cause: "disk full",
    });
    expect(storeCalls).toBe(1);
  });
});

describe("flash plugin misuse", () => {
  it("fails loudly when the plugin is not registered", async () => {
    const app = Fastify({ logger: false });
    app.get("/send", async (req) => {
      sendFlash(req, FlashMessage.info("lost"));
      return { ok: true };
    });

    const res = await app.inject({ method: "GET", url: "/send" });
    await app.close();

    expect(res.statusCode).toBe(500);
    expect(res.json().message).toBe(new FlashMailboxMissingError("send flash message").message);
  });

  it("refuses messages sent after the response was flushed", async () => {
    let lateError: unknown = null;
    const app = cookieApp();
    app.addHook("onResponse", async (req) => {
      try {
        req.flash.info("too late");
      } catch (error) {
        lateError = error;
      }
    });

    await app.inject({ method: "GET", url: "/show" });
    await app.close();

    expect(lateError).toBeInstanceOf(FlashMailboxClosedError);
  });

  it("applies a lowered minimum level", async () => {
    const app = Fastify({ logger: false });
    const store = CookieMessageStore.builder(KEY).secure(false).build();
    app.register(flashMessages, {
      framework: FlashMessagesFramework.builder(store).minimumLevel("debug").build(),
    });
    addDemoRoutes(app);

    const res = await app.inject({ method: "GET", url: "/set" });
    await app.close();

    expect(findCookie(res, "_flash")?.value).toBe(
      escapeCookieValue(
        fastifyCookie.sign(
          '[{"content":"Hey there!","level":"info"},{"content":"How\'s it going?","level":"debug"}]',
          KEY
        )
      )
    );
  });
});
