/**
 * Configuration options for a matching game
 * @module builder/game-options
 */

import { createSilentLogger, type Logger } from '../utils/logger'

/**
 * Configuration options for a matching game.
 */
export interface MatchingGameOptions {
  /**
   * Logger receiving solve progress.
   * Messages are prefixed with `[matching-game]`.
   * Default: silent
   */
  logger?: Logger

  /**
   * Check the computed pairing for blocking pairs before committing it.
   * A failed check throws UnstableMatchingError and leaves partners untouched.
   * Default: false
   */
  verifyStability?: boolean
}

/**
 * Default matching game configuration values
 */
export const DEFAULT_MATCHING_GAME_OPTIONS: Required<MatchingGameOptions> = {
  logger: createSilentLogger(),
  verifyStability: false,
}

/**
 * Merges user-provided game options with defaults
 * @param options - User-provided options
 * @returns Complete game options with defaults applied
 */
export function mergeGameOptions(
  options?: MatchingGameOptions
): Required<MatchingGameOptions> {
  if (!options) {
    return DEFAULT_MATCHING_GAME_OPTIONS
  }

  return {
    logger: options.logger ?? DEFAULT_MATCHING_GAME_OPTIONS.logger,
    verifyStability:
      options.verifyStability ?? DEFAULT_MATCHING_GAME_OPTIONS.verifyStability,
  }
}
