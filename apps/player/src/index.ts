/**
 * apps/player - Market-making plugin for the exchange harness
 */

export { PlayerAlgorithm, createPlayerAlgorithm, DEFAULT_PLAYER_NAME, type PlayerOptions } from "./player-algorithm";
export { createPlayerAlgorithmFromEnv } from "./from-env";
export { env, type Env } from "./env";
export * from "./services";
export * from "./usecases";
