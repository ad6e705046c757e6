/**
 * Matching game error classes
 * @module core/matching-error
 */

import { StablePairingError } from '../utils/errors'
import type { AgentName, AgentRole } from '../types'

/**
 * Base error class for all matching game errors
 */
export class MatchingGameError extends StablePairingError {
  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message, code, context)
    this.name = 'MatchingGameError'
  }
}

/**
 * Error thrown when the constructor receives neither a count nor two preference mappings
 */
export class InvalidGeneratorError extends MatchingGameError {
  constructor(generator: unknown, reason: string) {
    super(
      `generator must be a non-negative integer or a pair of preference mappings: ${reason}`,
      'INVALID_GENERATOR',
      { generator, reason }
    )
    this.name = 'InvalidGeneratorError'
  }
}

/**
 * Error thrown when a name does not belong to any agent on the expected side
 */
export class UnknownAgentError extends MatchingGameError {
  constructor(role: AgentRole, name: AgentName, context?: Record<string, unknown>) {
    super(`Unknown ${role}: ${String(name)}`, 'UNKNOWN_AGENT', {
      role,
      name,
      ...context,
    })
    this.name = 'UnknownAgentError'
  }
}

/**
 * Error thrown when two agents on one side share a name
 */
export class DuplicateAgentError extends MatchingGameError {
  constructor(role: AgentRole, name: AgentName) {
    super(`Duplicate ${role}: ${String(name)}`, 'DUPLICATE_AGENT', { role, name })
    this.name = 'DuplicateAgentError'
  }
}

/**
 * Error thrown when the two sides have different sizes
 */
export class GroupSizeMismatchError extends MatchingGameError {
  constructor(suitorCount: number, reviewerCount: number) {
    super(
      `Must have the same number of reviewers as suitors (${suitorCount} suitors, ${reviewerCount} reviewers)`,
      'GROUP_SIZE_MISMATCH',
      { suitorCount, reviewerCount }
    )
    this.name = 'GroupSizeMismatchError'
  }
}

/**
 * Error thrown when a preference list is unset or does not rank the whole opposite side
 */
export class IncompletePreferencesError extends MatchingGameError {
  constructor(role: AgentRole, name: AgentName, reason: string) {
    const side = role === 'suitor' ? 'Suitor' : 'Reviewer'
    super(
      `${side} preferences incomplete for ${String(name)}: ${reason}`,
      'INCOMPLETE_PREFERENCES',
      { role, name, reason }
    )
    this.name = 'IncompletePreferencesError'
  }
}

/**
 * Error thrown when results are requested before every agent has a partner
 */
export class UnsolvedGameError extends MatchingGameError {
  constructor(unassigned: string[]) {
    super(
      `Game has not been solved yet: ${unassigned.length} agent(s) without a partner`,
      'UNSOLVED_GAME',
      { unassigned }
    )
    this.name = 'UnsolvedGameError'
  }
}

/**
 * Error thrown when stability verification finds a blocking pair
 */
export class UnstableMatchingError extends MatchingGameError {
  constructor(pairs: Array<{ suitor: AgentName; reviewer: AgentName }>) {
    super(
      `Matching is not stable: ${pairs.length} blocking pair(s)`,
      'UNSTABLE_MATCHING',
      { pairs }
    )
    this.name = 'UnstableMatchingError'
  }
}
