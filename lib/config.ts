import { z } from "zod";
import { DEFAULT_USER_AGENT, type DeliveryFailurePolicy } from "@/types";
import { DEFAULT_SESSIONNET_URL } from "@/lib/scrapers/sources/sessionnet";
import { DEFAULT_EVENTS_SITE_URL } from "@/lib/scrapers/sources/municipal";

/** Empty strings count as unset, like a blank line in a .env file. */
const optionalStr = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const flag = optionalStr.transform((v) => v === "1" || v?.toLowerCase() === "true");

function positiveInt(fallback: number) {
  return optionalStr.pipe(z.coerce.number().int().positive().optional()).transform((v) => v ?? fallback);
}

function nonNegativeInt(fallback: number) {
  return optionalStr.pipe(z.coerce.number().int().nonnegative().optional()).transform((v) => v ?? fallback);
}

const EnvSchema = z
  .object({
    TG_TOKEN: optionalStr,
    TG_CHAT_ID: optionalStr,
    POST_EXISTING: flag,
    DRY_RUN: flag,
    DELIVERY_FAILURE: optionalStr.pipe(z.enum(["abort", "continue"]).optional()),
    SEEN_STORE: optionalStr.pipe(z.enum(["file", "firestore"]).optional()),
    STATE_FILE: optionalStr,
    SESSIONNET_URL: optionalStr.pipe(z.string().url().optional()),
    EVENTS_SITE_URL: optionalStr.pipe(z.string().url().optional()),
    EVENTS_SITEMAP_URL: optionalStr.pipe(z.string().url().optional()),
    EVENTS_LISTING_URL: optionalStr.pipe(z.string().url().optional()),
    FETCH_TIMEOUT_MS: positiveInt(30_000),
    FETCH_DELAY_MS: nonNegativeInt(500),
    USER_AGENT: optionalStr,
    FIREBASE_PROJECT_ID: optionalStr,
    FIREBASE_SERVICE_ACCOUNT_PATH: optionalStr,
    FIREBASE_SERVICE_ACCOUNT_KEY: optionalStr,
  })
  .superRefine((env, ctx) => {
    if (env.DRY_RUN) return;
    if (!env.TG_TOKEN) ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["TG_TOKEN"], message: "required" });
    if (!env.TG_CHAT_ID) ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["TG_CHAT_ID"], message: "required" });
  });

export interface AppConfig {
  telegram: { token: string; chatId: string } | null;
  dryRun: boolean;
  postExisting: boolean;
  failurePolicy: DeliveryFailurePolicy;
  seenStore: "file" | "firestore";
  stateFile: string;
  sessionNetUrl: string;
  eventsSiteUrl: string;
  eventsSitemapUrl?: string;
  eventsListingUrl?: string;
  fetchTimeoutMs: number;
  fetchDelayMs: number;
  userAgent: string;
  firebase: { projectId?: string; serviceAccountPath?: string; serviceAccountKey?: string };
}

export class ConfigError extends Error {
  constructor(readonly issues: z.ZodIssue[]) {
    super(`Invalid configuration: ${issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) throw new ConfigError(parsed.error.issues);
  const e = parsed.data;

  return {
    telegram: e.TG_TOKEN && e.TG_CHAT_ID ? { token: e.TG_TOKEN, chatId: e.TG_CHAT_ID } : null,
    dryRun: e.DRY_RUN,
    postExisting: e.POST_EXISTING,
    failurePolicy: e.DELIVERY_FAILURE ?? "abort",
    seenStore: e.SEEN_STORE ?? "file",
    stateFile: e.STATE_FILE ?? "state.json",
    sessionNetUrl: e.SESSIONNET_URL ?? DEFAULT_SESSIONNET_URL,
    eventsSiteUrl: e.EVENTS_SITE_URL ?? DEFAULT_EVENTS_SITE_URL,
    eventsSitemapUrl: e.EVENTS_SITEMAP_URL,
    eventsListingUrl: e.EVENTS_LISTING_URL,
    fetchTimeoutMs: e.FETCH_TIMEOUT_MS,
    fetchDelayMs: e.FETCH_DELAY_MS,
    userAgent: e.USER_AGENT ?? DEFAULT_USER_AGENT,
    firebase: {
      projectId: e.FIREBASE_PROJECT_ID,
      serviceAccountPath: e.FIREBASE_SERVICE_ACCOUNT_PATH,
      serviceAccountKey: e.FIREBASE_SERVICE_ACCOUNT_KEY,
    },
  };
}
