import { config as loadEnv } from "dotenv";
import { z } from "zod";

import { CookieMessageStore } from "./flash/cookie_store";
import { FlashMessagesFramework } from "./flash/framework";
import { LevelSchema } from "./flash/message";
import { SessionMessageStore } from "./flash/session_store";
import { SESSION_PRUNE_INTERVAL_MS } from "./session/sqlite_session_store";

if (process.env.NODE_ENV !== "production") {
  loadEnv();
}

const isTruthy = (value: string) => ["1", "true", "yes", "on"].includes(value.toLowerCase());

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3333),
    FLASH_BACKEND: z.enum(["cookie", "session"]).default("cookie"),
    FLASH_SIGNING_KEY: z.string().min(32).optional(),
    FLASH_COOKIE_NAME: z.string().min(1).default("_flash"),
    FLASH_COOKIE_SECURE: z.string().transform(isTruthy).default("true"),
    FLASH_SIZE_LIMIT: z.coerce.number().int().positive().default(2048),
    FLASH_SESSION_KEY: z.string().min(1).default("_flash"),
    FLASH_MIN_LEVEL: LevelSchema.default("info"),
    SESSION_SECRET: z.string().min(32).optional(),
    SESSION_DB_PATH: z.string().min(1).default("./data/sessions.db"),
    SESSION_PRUNE_INTERVAL_MS: z.coerce.number().int().positive().default(SESSION_PRUNE_INTERVAL_MS),
  })
  .superRefine((env, ctx) => {
    if (env.FLASH_BACKEND === "cookie" && !env.FLASH_SIGNING_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["FLASH_SIGNING_KEY"],
        message: "FLASH_SIGNING_KEY is required when FLASH_BACKEND=cookie",
      });
    }
    if (env.FLASH_BACKEND === "session" && !env.SESSION_SECRET) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["SESSION_SECRET"],
        message: "SESSION_SECRET is required when FLASH_BACKEND=session",
      });
    }
  });

export type CookieBackendConfig = {
  kind: "cookie";
  signingKey: string;
  cookieName: string;
  secure: boolean;
  sizeLimit: number;
};

export type SessionBackendConfig = {
  kind: "session";
  key: string;
  secret: string;
  dbPath: string;
  pruneIntervalMs: number;
};

export type AppConfig = {
  port: number;
  minimumLevel: z.infer<typeof LevelSchema>;
  backend: CookieBackendConfig | SessionBackendConfig;
};

export class ConfigError extends Error {
  public readonly details: Record<string, string[] | undefined>;

  constructor(details: Record<string, string[] | undefined>) {
    const fields = Object.keys(details).join(", ");
    super(`Invalid configuration: ${fields}`);
    this.name = "ConfigError";
    this.details = details;
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.flatten().fieldErrors);
  }

  const e = parsed.data;
  const backend: AppConfig["backend"] =
    e.FLASH_BACKEND === "session"
      ? {
          kind: "session",
          key: e.FLASH_SESSION_KEY,
          secret: e.SESSION_SECRET ?? "",
          dbPath: e.SESSION_DB_PATH,
          pruneIntervalMs: e.SESSION_PRUNE_INTERVAL_MS,
        }
      : {
          kind: "cookie",
          signingKey: e.FLASH_SIGNING_KEY ?? "",
          cookieName: e.FLASH_COOKIE_NAME,
          secure: e.FLASH_COOKIE_SECURE,
          sizeLimit: e.FLASH_SIZE_LIMIT,
        };

  return { port: e.PORT, minimumLevel: e.FLASH_MIN_LEVEL, backend };
}

export function buildFramework(config: AppConfig): FlashMessagesFramework {
  const store =
    config.backend.kind === "cookie"
      ? CookieMessageStore.builder(config.backend.signingKey)
          .cookieName(config.backend.cookieName)
          .secure(config.backend.secure)
          .bytesSizeLimit(config.backend.sizeLimit)
          .build()
      : SessionMessageStore.withKey(config.backend.key);

  return FlashMessagesFramework.builder(store).minimumLevel(config.minimumLevel).build();
}
