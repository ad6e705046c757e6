import type { AgentName } from '../types'
import type { Logger } from '../utils/logger'
import type { MatchingGameOptions } from './game-options'
import { MatchingGame } from '../core/matching-game'
import {
  BuilderSequenceError,
  requireAgentName,
  requireArray,
} from '../utils/errors'

/**
 * Fluent builder for configuring and creating a MatchingGame instance.
 *
 * Agents are created in the order they are first declared. Declaring a name
 * again on the same side replaces its preferences and keeps its position.
 *
 * @example
 * ```typescript
 * const game = StablePairing.create()
 *   .suitor('J', ['A', 'B'])
 *   .suitor('K', ['B', 'A'])
 *   .reviewer('A', ['K', 'J'])
 *   .reviewer('B', ['J', 'K'])
 *   .verifyStability()
 *   .build()
 * ```
 */
export class MatchingGameBuilder {
  private suitorPreferences = new Map<AgentName, readonly AgentName[]>()
  private reviewerPreferences = new Map<AgentName, readonly AgentName[]>()
  private gameOptions: MatchingGameOptions = {}

  /**
   * Declares a suitor and its ranking of the reviewers.
   *
   * @param name - The suitor's name
   * @param preferences - Reviewer names, best first
   * @returns This builder for chaining
   */
  suitor(name: AgentName, preferences: readonly AgentName[]): this {
    this.suitorPreferences.set(
      requireAgentName(name, 'name'),
      [...requireArray(preferences, 'preferences')]
    )
    return this
  }

  /**
   * Declares a reviewer and its ranking of the suitors.
   *
   * @param name - The reviewer's name
   * @param preferences - Suitor names, best first
   * @returns This builder for chaining
   */
  reviewer(name: AgentName, preferences: readonly AgentName[]): this {
    this.reviewerPreferences.set(
      requireAgentName(name, 'name'),
      [...requireArray(preferences, 'preferences')]
    )
    return this
  }

  /**
   * Sets the logger receiving solve progress.
   *
   * @returns This builder for chaining
   */
  logger(logger: Logger): this {
    this.gameOptions = { ...this.gameOptions, logger }
    return this
  }

  /**
   * Checks every computed pairing for blocking pairs before it is committed.
   *
   * @returns This builder for chaining
   */
  verifyStability(enabled: boolean = true): this {
    this.gameOptions = { ...this.gameOptions, verifyStability: enabled }
    return this
  }

  /**
   * Builds the game from the declared agents.
   *
   * @returns A new MatchingGame
   * @throws {BuilderSequenceError} If no agent was declared
   * @throws {UnknownAgentError} If a preference names an undeclared agent
   */
  build(): MatchingGame {
    if (this.suitorPreferences.size === 0 && this.reviewerPreferences.size === 0) {
      throw new BuilderSequenceError(
        'build',
        'declare at least one suitor or reviewer before building'
      )
    }

    return new MatchingGame(
      [new Map(this.suitorPreferences), new Map(this.reviewerPreferences)],
      this.gameOptions
    )
  }
}

/**
 * Entry point for the fluent API.
 *
 * @example
 * ```typescript
 * import { StablePairing } from 'stable-pairing'
 *
 * const matching = StablePairing.create()
 *   .suitor('J', ['A'])
 *   .reviewer('A', ['J'])
 *   .build()
 *   .solve()
 * ```
 */
export const StablePairing = {
  /**
   * Create a new matching game builder.
   *
   * @returns A new MatchingGameBuilder instance
   */
  create(): MatchingGameBuilder {
    return new MatchingGameBuilder()
  },
}
