/**
 * @ilpcore/ledger-memory — Adaptor configuration.
 *
 * Validates adaptor settings with Zod, from a plain object or from
 * environment variables.
 */

import { z } from "zod";
import { Address } from "@ilpcore/packet";
import { DEFAULT_RETRY_CONFIG } from "./retry.js";
import type { RetryConfig } from "./retry.js";

// =============================================================================
// Schema
// =============================================================================

const AddressText = (kind: "prefix" | "account") =>
  z.string().refine(
    (value) => Address.isValid(value) && Address.parse(value).isPrefix() === (kind === "prefix"),
    { message: kind === "prefix" ? "must be a ledger prefix ending in '.'" : "must be an account address" },
  );

export const ReconnectSchema = z.object({
  maxAttempts: z.coerce.number().int().min(1).default(DEFAULT_RETRY_CONFIG.maxAttempts),
  baseDelayMs: z.coerce.number().int().min(0).default(DEFAULT_RETRY_CONFIG.baseDelayMs),
  maxDelayMs: z.coerce.number().int().min(0).default(DEFAULT_RETRY_CONFIG.maxDelayMs),
  jitterMs: z.coerce.number().int().min(0).default(DEFAULT_RETRY_CONFIG.jitterMs),
});

export const InMemoryAdaptorConfigSchema = z
  .object({
    ledgerPrefix: AddressText("prefix"),
    account: AddressText("account"),
    reconnect: ReconnectSchema.default({}),
    logLevel: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
  })
  .refine(
    (config) =>
      !Address.isValid(config.ledgerPrefix) ||
      !Address.isValid(config.account) ||
      Address.parse(config.ledgerPrefix).isPrefixOf(Address.parse(config.account)),
    { message: "account must be on the ledger", path: ["account"] },
  );

/** Validated configuration with addresses parsed. */
export interface InMemoryAdaptorConfig {
  readonly ledgerPrefix: Address;
  readonly account: Address;
  readonly reconnect: RetryConfig;
  readonly logLevel: z.infer<typeof InMemoryAdaptorConfigSchema>["logLevel"];
}

// =============================================================================
// Loaders
// =============================================================================

/**
 * @throws {z.ZodError} if the input is invalid
 */
export function parseAdaptorConfig(input: unknown): InMemoryAdaptorConfig {
  const parsed = InMemoryAdaptorConfigSchema.parse(input);
  return {
    ledgerPrefix: Address.parse(parsed.ledgerPrefix),
    account: Address.parse(parsed.account),
    reconnect: parsed.reconnect,
    logLevel: parsed.logLevel,
  };
}

/**
 * Load adaptor configuration from environment variables.
 *
 * @throws {z.ZodError} if required variables are missing or invalid
 */
export function loadAdaptorConfig(
  env: Record<string, string | undefined> = process.env,
): InMemoryAdaptorConfig {
  const reconnect: Record<string, string> = {};
  const set = (key: keyof RetryConfig, value: string | undefined) => {
    if (value !== undefined && value !== "") reconnect[key] = value;
  };
  set("maxAttempts", env.ILP_RECONNECT_MAX_ATTEMPTS);
  set("baseDelayMs", env.ILP_RECONNECT_BASE_DELAY_MS);
  set("maxDelayMs", env.ILP_RECONNECT_MAX_DELAY_MS);
  set("jitterMs", env.ILP_RECONNECT_JITTER_MS);

  return parseAdaptorConfig({
    ledgerPrefix: env.ILP_LEDGER_PREFIX ?? "",
    account: env.ILP_ACCOUNT ?? "",
    reconnect,
    ...(env.LOG_LEVEL !== undefined && env.LOG_LEVEL !== "" ? { logLevel: env.LOG_LEVEL } : {}),
  });
}
