/**
 * Validation functions for matching games
 * @module core/validation
 */

import type { AgentName } from '../types'
import { oppositeRole, type Agent } from './agent'
import {
  DuplicateAgentError,
  GroupSizeMismatchError,
  IncompletePreferencesError,
  InvalidGeneratorError,
  UnsolvedGameError,
} from './matching-error'

/**
 * Preference entries of one side, in input order
 */
export type PreferenceEntries = Array<[AgentName, AgentName[]]>

/**
 * Constructor input after validation
 */
export type ParsedGenerator =
  | { kind: 'count'; count: number }
  | { kind: 'mappings'; suitors: PreferenceEntries; reviewers: PreferenceEntries }

/**
 * Whether a value can be used as an agent name
 */
export function isAgentName(value: unknown): value is AgentName {
  return typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value))
}

/**
 * Validates constructor input
 * @param generator - A count or a pair of preference mappings
 * @throws {InvalidGeneratorError} If the input is neither
 */
export function parseGenerator(generator: unknown): ParsedGenerator {
  if (typeof generator === 'number') {
    if (!Number.isInteger(generator) || generator < 0) {
      throw new InvalidGeneratorError(generator, 'count must be a non-negative integer')
    }
    return { kind: 'count', count: generator }
  }

  if (!Array.isArray(generator) || generator.length !== 2) {
    throw new InvalidGeneratorError(
      generator,
      'expected a count or exactly two preference mappings'
    )
  }

  return {
    kind: 'mappings',
    suitors: readPreferenceMapping(generator[0], 'suitor', generator),
    reviewers: readPreferenceMapping(generator[1], 'reviewer', generator),
  }
}

function readPreferenceMapping(
  mapping: unknown,
  side: string,
  generator: unknown
): PreferenceEntries {
  let entries: Array<[unknown, unknown]>
  // Object keys are strings, so targets in a plain object are read as strings too
  let keyedByString = false
  if (mapping instanceof Map) {
    entries = [...mapping.entries()]
  } else if (typeof mapping === 'object' && mapping !== null && !Array.isArray(mapping)) {
    entries = Object.entries(mapping)
    keyedByString = true
  } else {
    throw new InvalidGeneratorError(
      generator,
      `${side} preferences must be a Map or a plain object`
    )
  }

  return entries.map(([name, preferences]): [AgentName, AgentName[]] => {
    if (!isAgentName(name)) {
      throw new InvalidGeneratorError(
        generator,
        `${side} name ${String(name)} must be a string or a finite number`
      )
    }
    if (!Array.isArray(preferences)) {
      throw new InvalidGeneratorError(
        generator,
        `preferences of ${side} ${String(name)} must be an array`
      )
    }

    const names: AgentName[] = []
    for (const target of preferences) {
      if (!isAgentName(target)) {
        throw new InvalidGeneratorError(
          generator,
          `preferences of ${side} ${String(name)} contain ${String(target)}, which is not a name`
        )
      }
      names.push(keyedByString ? String(target) : target)
    }
    return [name, names]
  })
}

/**
 * Checks that a game can be solved: equal sides, distinct names on each side,
 * and every preference list ranking the whole opposite side exactly once.
 *
 * @throws {GroupSizeMismatchError} If the sides differ in size
 * @throws {DuplicateAgentError} If two agents on one side share a name
 * @throws {IncompletePreferencesError} If a preference list is unset or incomplete
 */
export function checkComplete(
  suitors: readonly Agent[],
  reviewers: readonly Agent[]
): void {
  if (suitors.length !== reviewers.length) {
    throw new GroupSizeMismatchError(suitors.length, reviewers.length)
  }

  requireDistinct(suitors)
  requireDistinct(reviewers)

  const suitorKeys = sortedKeys(suitors)
  const reviewerKeys = sortedKeys(reviewers)

  for (const suitor of suitors) {
    requireFullRanking(suitor, reviewerKeys)
  }
  for (const reviewer of reviewers) {
    requireFullRanking(reviewer, suitorKeys)
  }
}

/**
 * Pairs every agent with its partner.
 *
 * @throws {UnsolvedGameError} If any agent is unassigned
 */
export function collectAssignments(
  agents: readonly Agent[]
): Array<readonly [Agent, Agent]> {
  const assignments: Array<readonly [Agent, Agent]> = []
  const unassigned: string[] = []

  for (const agent of agents) {
    const partner = agent.partner
    if (partner === null) {
      unassigned.push(agent.key)
    } else {
      assignments.push([agent, partner])
    }
  }

  if (unassigned.length > 0) {
    throw new UnsolvedGameError(unassigned)
  }

  return assignments
}

/**
 * Checks that every agent on both sides has a partner.
 *
 * @throws {UnsolvedGameError} If any agent is unassigned
 */
export function checkSolved(
  suitors: readonly Agent[],
  reviewers: readonly Agent[]
): void {
  collectAssignments([...suitors, ...reviewers])
}

function requireDistinct(agents: readonly Agent[]): void {
  const seen = new Set<string>()
  for (const agent of agents) {
    if (seen.has(agent.key)) {
      throw new DuplicateAgentError(agent.role, agent.name)
    }
    seen.add(agent.key)
  }
}

function requireFullRanking(agent: Agent, expectedKeys: readonly string[]): void {
  const preferences = agent.preferences
  if (preferences === null) {
    throw new IncompletePreferencesError(agent.role, agent.name, 'preferences are unset')
  }

  const keys = sortedKeys(preferences)
  const complete =
    keys.length === expectedKeys.length &&
    keys.every((key, index) => key === expectedKeys[index])

  if (!complete) {
    throw new IncompletePreferencesError(
      agent.role,
      agent.name,
      `must rank every ${oppositeRole(agent.role)} exactly once`
    )
  }
}

function sortedKeys(agents: readonly Agent[]): string[] {
  return agents.map((agent) => agent.key).sort()
}
