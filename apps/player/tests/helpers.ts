import { vi } from "vitest";

import type { Logger } from "@mm-plugin/utils";

/**
 * Logger that records calls instead of printing
 */
export function createSilentLogger(): Logger {
  return {
    log: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}
