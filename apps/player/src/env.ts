/**
 * Player Environment Configuration
 *
 * - Type-safe environment variables with Zod validation
 *
 * Every variable has a default, so the plugin runs with no environment at all;
 * set them to tune quoting without touching the harness.
 */

import { createEnv } from "@t3-oss/env-core";
import { z } from "zod";

/**
 * t3-env (@t3-oss/env-core) validated environment
 *
 * Import this `env` instead of reading `process.env` directly.
 */
export const env = createEnv({
  server: {
    // =========================================================================
    // Logging
    // =========================================================================

    /**
     * Log level
     *
     * ERROR | WARN | LOG | INFO | DEBUG
     * - DEBUG: every turn's quotes and every fill
     */
    LOG_LEVEL: z.enum(["ERROR", "WARN", "LOG", "INFO", "DEBUG"]).default("INFO"),

    // =========================================================================
    // Identity
    // =========================================================================

    /**
     * Bot name stamped on every order and matched against trade counterparties
     */
    PLAYER_NAME: z.string().min(1).default("MarketMakerBot"),

    // =========================================================================
    // Quoting
    // =========================================================================

    /** Total quoted width between buy and sell */
    QUOTE_BASE_SPREAD: z.coerce.number().default(1),

    /** Skew applied at a full position limit */
    QUOTE_SKEW_FACTOR: z.coerce.number().default(0.5),

    /** Reference price when the book is empty */
    QUOTE_DEFAULT_REFERENCE_PRICE: z.coerce.number().default(1000),

    /** Order size before the near-limit reduction */
    QUOTE_BASE_ORDER_SIZE: z.coerce.number().default(5),

    /**
     * Tickers not to quote, comma separated
     *
     * e.g. QUOTE_HALTED_TICKERS=SOBER,UEC
     */
    QUOTE_HALTED_TICKERS: z.string().default(""),
  },
  runtimeEnv: process.env,
  emptyStringAsUndefined: true,
});

export type Env = typeof env;
