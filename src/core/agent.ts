import type { AgentName, AgentRole, PreferenceState } from '../types'
import { InvalidParameterError } from '../utils/errors'

/**
 * Builds the identity key of an agent. The type of the name is part of the key,
 * so suitor `0` and suitor `'0'` are different agents.
 */
export function agentKey(role: AgentRole, name: AgentName): string {
  return `${role}:${typeof name}:${String(name)}`
}

/**
 * Returns the side an agent of the given role ranks.
 */
export function oppositeRole(role: AgentRole): AgentRole {
  return role === 'suitor' ? 'reviewer' : 'suitor'
}

/**
 * A suitor or reviewer taking part in a matching game.
 *
 * Identity is the pair of role and name, exposed as `key`. Preferences start out
 * unset and are reset to unset whenever the opposite side grows. The partner is
 * written only when a solve commits its result.
 *
 * @example
 * ```typescript
 * const game = new MatchingGame(2)
 * const suitor = game.suitors[0]
 * suitor.key // 'suitor:number:0'
 * ```
 */
export class Agent {
  readonly key: string
  private state: PreferenceState<Agent>
  private currentPartner: Agent | null = null

  constructor(
    readonly name: AgentName,
    readonly role: AgentRole,
    expectedPreferences: number = 0
  ) {
    this.key = agentKey(role, name)
    this.state = { status: 'unset', length: expectedPreferences }
  }

  /** Assigned partner, or null while unassigned */
  get partner(): Agent | null {
    return this.currentPartner
  }

  get preferenceState(): PreferenceState<Agent> {
    return this.state
  }

  /** Ranked preferences, or null while unset */
  get preferences(): readonly Agent[] | null {
    return this.state.status === 'set' ? this.state.agents : null
  }

  hasPreferences(): boolean {
    return this.state.status === 'set'
  }

  /**
   * Replaces the preference list. Every target must sit on the opposite side.
   *
   * @param targets - Opposite-side agents ranked best to worst
   * @throws {InvalidParameterError} If a target has the same role as this agent
   */
  setPreferences(targets: readonly Agent[]): void {
    const expected = oppositeRole(this.role)
    const misplaced = targets.find((target) => target.role !== expected)
    if (misplaced) {
      throw new InvalidParameterError(
        'targets',
        misplaced.name,
        `${this.role} ${String(this.name)} can only rank ${expected}s`
      )
    }
    this.state = { status: 'set', agents: [...targets] }
  }

  /**
   * Drops the preference list, leaving a placeholder of the given length.
   */
  resetPreferences(length: number): void {
    this.state = { status: 'unset', length }
  }

  /**
   * Records the partner chosen by a solve.
   * @internal
   */
  setPartner(partner: Agent | null): void {
    this.currentPartner = partner
  }

  /**
   * Position of an agent in this agent's preferences (0 is best), or -1 when
   * the agent is not ranked or the preferences are unset.
   */
  rankOf(other: Agent): number {
    const preferences = this.preferences
    if (!preferences) {
      return -1
    }
    return preferences.findIndex((candidate) => candidate.equals(other))
  }

  /**
   * Whether this agent would rather have `candidate` than `current`. Any ranked
   * candidate beats having no partner.
   */
  prefers(candidate: Agent, current: Agent | null): boolean {
    const candidateRank = this.rankOf(candidate)
    if (candidateRank === -1) {
      return false
    }
    if (current === null) {
      return true
    }
    const currentRank = this.rankOf(current)
    return currentRank === -1 || candidateRank < currentRank
  }

  equals(other: Agent): boolean {
    return this.key === other.key
  }

  toString(): string {
    return String(this.name)
  }
}
