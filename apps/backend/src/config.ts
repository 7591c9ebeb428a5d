import { config as loadEnv } from "dotenv";
import { z } from "zod";
import path from "path";
import { fileURLToPath } from "url";

const boolFromEnv = (defaultValue: boolean) =>
  z.preprocess((value) => {
    if (typeof value === "boolean") return value;
    if (typeof value === "number") return value !== 0;
    if (typeof value === "string") {
      const normalized = value.trim().toLowerCase();
      if (normalized === "") return undefined;
      if (["true", "1", "yes", "y", "on"].includes(normalized)) return true;
      if (["false", "0", "no", "n", "off"].includes(normalized)) return false;
    }
    return value;
  }, z.boolean().default(defaultValue));

const optionalString = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().optional()
);

// Load .env from apps/backend directory, regardless of process.cwd()
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const envPath = path.resolve(__dirname, "../.env");
const envResult = loadEnv({ path: envPath });

if (envResult.error && !envResult.error.message.includes("ENOENT")) {
  console.warn(`[config] Failed to load .env from ${envPath}:`, envResult.error.message);
}

export const envSchema = z.object({
  PORT: z.coerce.number().default(4000),
  BIND_HOST: z.string().default("127.0.0.1"),
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  SQLITE_DB: z.string().default("data/confreg.db"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  // Cart + order lifecycle
  CART_EXPIRY_MINUTES: z.coerce.number().int().positive().default(30),
  PENDING_ORDER_HOLD_MINUTES: z.coerce.number().int().positive().default(15),
  ORDER_REFERENCE_PREFIX: z.string().min(1).default("ORD"),
  CURRENCY: z.string().length(3).default("usd").transform((value) => value.toLowerCase()),
  // Stripe (keys live on the conference row)
  STRIPE_WEBHOOK_TOLERANCE_SEC: z.coerce.number().int().positive().default(300),
  // Background cart reaper
  CART_EXPIRY_SWEEP_ENABLED: boolFromEnv(true),
  CART_EXPIRY_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(5 * 60 * 1000),
  // Auth
  ADMIN_API_KEY: optionalString,
  USER_ID_HEADER: z.string().default("x-user-id").transform((value) => value.toLowerCase()),
  GRACEFUL_SHUTDOWN_MS: z.coerce.number().default(10000),
});

export type RuntimeConfig = ReturnType<typeof toRuntimeConfig>;

export function toRuntimeConfig(parsed: z.infer<typeof envSchema>) {
  return Object.freeze({
    port: parsed.PORT,
    bindHost: parsed.BIND_HOST,
    nodeEnv: parsed.NODE_ENV,
    sqlitePath: parsed.SQLITE_DB,
    logLevel: parsed.LOG_LEVEL,
    cartExpiryMinutes: parsed.CART_EXPIRY_MINUTES,
    pendingOrderHoldMinutes: parsed.PENDING_ORDER_HOLD_MINUTES,
    orderReferencePrefix: parsed.ORDER_REFERENCE_PREFIX,
    currency: parsed.CURRENCY,
    stripeWebhookToleranceSec: parsed.STRIPE_WEBHOOK_TOLERANCE_SEC,
    cartExpirySweepEnabled: parsed.CART_EXPIRY_SWEEP_ENABLED,
    cartExpirySweepIntervalMs: parsed.CART_EXPIRY_SWEEP_INTERVAL_MS,
    adminApiKey: parsed.ADMIN_API_KEY ?? "",
    userIdHeader: parsed.USER_ID_HEADER,
    gracefulShutdownMs: parsed.GRACEFUL_SHUTDOWN_MS,
  });
}

export const runtimeConfig: RuntimeConfig = toRuntimeConfig(envSchema.parse(process.env));
