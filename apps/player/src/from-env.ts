/**
 * Player construction from the validated environment
 */

import type { Result } from "neverthrow";
import type { ParamGateError, ProductInfo } from "@mm-plugin/core";
import { logger, parseLogLevel } from "@mm-plugin/utils";

import { env, type Env } from "./env";
import { createPlayerAlgorithm, type PlayerAlgorithm } from "./player-algorithm";
import { paramsFromEnv } from "./services/params-config";

export function createPlayerAlgorithmFromEnv(
  products: readonly ProductInfo[],
  source: Env = env,
): Result<PlayerAlgorithm, ParamGateError> {
  logger.setLevel(parseLogLevel(source.LOG_LEVEL) ?? null);

  const result = createPlayerAlgorithm(products, paramsFromEnv(source), { name: source.PLAYER_NAME });
  if (result.isErr()) {
    logger.error("Invalid strategy params", { issues: result.error.issues });
  }
  return result;
}
