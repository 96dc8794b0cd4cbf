export interface EngineConfig {
  /** Log every attempted move from the controller. */
  moveLog: boolean;
  logTag: string;
}

export const DEFAULT_LOG_TAG = "[chess-core]";

type Env = Record<string, string | undefined>;

export function resolveEngineConfig(env: Env = process.env): EngineConfig {
  const tag = env.CHESS_LOG_TAG && env.CHESS_LOG_TAG.trim() ? env.CHESS_LOG_TAG.trim() : DEFAULT_LOG_TAG;
  return {
    moveLog: env.CHESS_MOVE_LOG === "1",
    logTag: tag,
  };
}
