import { v4 as uuidv4 } from 'uuid'
import type {
  AgentName,
  AgentRole,
  BipartiteMatching,
  MatchingGameGenerator,
  MatchingResult,
  SolveOptions,
  SolveReport,
} from '../types'
import { mergeGameOptions, type MatchingGameOptions } from '../builder/game-options'
import { createPrefixedLogger, type Logger } from '../utils/logger'
import { Agent, agentKey, oppositeRole } from './agent'
import { MatchingEngine, type EngineInput } from './engine'
import {
  IncompletePreferencesError,
  UnknownAgentError,
  UnstableMatchingError,
} from './matching-error'
import {
  checkComplete,
  checkSolved,
  collectAssignments,
  parseGenerator,
  type PreferenceEntries,
} from './validation'

/**
 * A two-sided matching game solved with deferred acceptance.
 *
 * The game owns two ordered collections of agents and their preference lists.
 * `solve()` computes a stable pairing on working copies and writes the partners
 * back onto the agents only once the pairing is complete.
 *
 * @example
 * ```typescript
 * const game = new MatchingGame([
 *   { J: ['A', 'B'], K: ['B', 'A'] },
 *   { A: ['K', 'J'], B: ['J', 'K'] },
 * ])
 * const matching = game.solve()
 * game.getSuitor('J')?.partner?.name // 'A'
 * ```
 */
export class MatchingGame {
  private readonly suitorList: Agent[] = []
  private readonly reviewerList: Agent[] = []
  private readonly options: Required<MatchingGameOptions>
  private readonly logger: Logger
  private readonly engine: MatchingEngine
  private report?: SolveReport

  /**
   * @param generator - Agents per side, or `[suitorPreferences, reviewerPreferences]`
   * @param options - Logger and verification settings
   * @throws {InvalidGeneratorError} If the generator is neither form
   * @throws {UnknownAgentError} If a preference names no agent on the opposite side
   */
  constructor(generator: MatchingGameGenerator, options?: MatchingGameOptions) {
    this.options = mergeGameOptions(options)
    this.logger = createPrefixedLogger('matching-game', this.options.logger)
    this.engine = new MatchingEngine(this.logger)

    const parsed = parseGenerator(generator)
    if (parsed.kind === 'count') {
      for (let i = 0; i < parsed.count; i++) {
        this.addSuitor()
        this.addReviewer()
      }
    } else {
      this.populate(parsed.suitors, parsed.reviewers)
    }
  }

  get suitors(): readonly Agent[] {
    return this.suitorList
  }

  get reviewers(): readonly Agent[] {
    return this.reviewerList
  }

  /** Report of the latest successful solve */
  get lastReport(): SolveReport | undefined {
    return this.report
  }

  /**
   * Adds a suitor. Every reviewer's preferences go back to unset, since the
   * set of suitors they must rank just changed.
   *
   * @param name - Defaults to the suitor's position
   * @returns The new suitor
   */
  addSuitor(name?: AgentName): Agent {
    return this.addAgent('suitor', name)
  }

  /**
   * Adds a reviewer. Every suitor's preferences go back to unset, since the
   * set of reviewers they must rank just changed.
   *
   * @param name - Defaults to the reviewer's position
   * @returns The new reviewer
   */
  addReviewer(name?: AgentName): Agent {
    return this.addAgent('reviewer', name)
  }

  getSuitor(name: AgentName): Agent | undefined {
    return findByName(this.suitorList, 'suitor', name)
  }

  getReviewer(name: AgentName): Agent | undefined {
    return findByName(this.reviewerList, 'reviewer', name)
  }

  /**
   * Sets a suitor's ranking of the reviewers.
   *
   * @throws {UnknownAgentError} If the suitor or a ranked reviewer does not exist
   */
  setSuitorPreferences(name: AgentName, reviewerNames: readonly AgentName[]): void {
    this.setPreferences('suitor', name, reviewerNames)
  }

  /**
   * Sets a reviewer's ranking of the suitors.
   *
   * @throws {UnknownAgentError} If the reviewer or a ranked suitor does not exist
   */
  setReviewerPreferences(name: AgentName, suitorNames: readonly AgentName[]): void {
    this.setPreferences('reviewer', name, suitorNames)
  }

  /**
   * Checks that the game can be solved.
   *
   * @throws {GroupSizeMismatchError} If the sides differ in size
   * @throws {DuplicateAgentError} If two agents on one side share a name
   * @throws {IncompletePreferencesError} If a preference list is unset or incomplete
   */
  checkComplete(): void {
    checkComplete(this.suitorList, this.reviewerList)
  }

  /**
   * Checks that every agent has a partner.
   *
   * @throws {UnsolvedGameError} If any agent is unassigned
   */
  checkSolved(): void {
    checkSolved(this.suitorList, this.reviewerList)
  }

  isSolved(): boolean {
    return [...this.suitorList, ...this.reviewerList].every(
      (agent) => agent.partner !== null
    )
  }

  /**
   * Clears the partner of every agent.
   */
  resetPartners(): void {
    for (const agent of [...this.suitorList, ...this.reviewerList]) {
      agent.setPartner(null)
    }
  }

  /**
   * Computes a stable matching with deferred acceptance.
   *
   * Suitors propose unless `invert` is set, in which case reviewers do; the
   * proposing side gets its best stable partners. Stored preferences are never
   * modified and partners are only written once the pairing is complete, so a
   * failed solve leaves the game as it was.
   *
   * @param options - Solve options
   * @returns Every agent mapped to `[partner]`
   * @throws {GroupSizeMismatchError} If the sides differ in size
   * @throws {IncompletePreferencesError} If a preference list is unset or incomplete
   * @throws {UnstableMatchingError} If verification is enabled and finds a blocking pair
   */
  solve(options: SolveOptions = {}): MatchingResult {
    this.checkComplete()

    const invert = options.invert ?? false
    const proposers = invert ? this.reviewerList : this.suitorList
    const receivers = invert ? this.suitorList : this.reviewerList
    const id = uuidv4()
    const startedAt = Date.now()

    this.logger.debug('Solving matching game', {
      id,
      invert,
      size: proposers.length,
    })

    const input: EngineInput = {
      proposerPreferences: toPositions(proposers, receivers),
      receiverPreferences: toPositions(receivers, proposers),
    }
    const outcome = this.engine.run(input)

    if (this.options.verifyStability) {
      const blocking = this.engine.blockingPairs(input, outcome)
      if (blocking.length > 0) {
        const pairs = blocking.map(([proposer, receiver]) => {
          const [suitor, reviewer] = invert
            ? [receivers[receiver], proposers[proposer]]
            : [proposers[proposer], receivers[receiver]]
          return { suitor: suitor.name, reviewer: reviewer.name }
        })
        this.logger.error('Computed matching is not stable', { id, pairs })
        throw new UnstableMatchingError(pairs)
      }
    }

    proposers.forEach((agent, i) => {
      const partner = outcome.proposerPartners[i]
      agent.setPartner(partner === null ? null : receivers[partner])
    })
    receivers.forEach((agent, i) => {
      const partner = outcome.receiverPartners[i]
      agent.setPartner(partner === null ? null : proposers[partner])
    })

    const matching = this.matching()

    this.report = {
      id,
      invert,
      size: proposers.length,
      proposals: outcome.proposals,
      rejections: outcome.rejections,
      breakups: outcome.breakups,
      durationMs: Date.now() - startedAt,
      solvedAt: new Date(),
    }
    this.logger.info('Matching game solved', { ...this.report })

    return matching
  }

  /**
   * Current pairing, suitors first, then reviewers, each in registry order.
   *
   * @throws {UnsolvedGameError} If any agent is unassigned
   */
  matching(): MatchingResult {
    const result: MatchingResult = new Map()
    for (const [agent, partner] of collectAssignments([
      ...this.suitorList,
      ...this.reviewerList,
    ])) {
      result.set(agent, [partner])
    }
    return result
  }

  /**
   * Two-sided view of the solved game for graph consumers. Does not solve.
   *
   * @throws {UnsolvedGameError} If any agent is unassigned
   */
  toBipartite(): BipartiteMatching {
    const adjacency = this.matching()
    return {
      left: [...this.suitorList],
      right: [...this.reviewerList],
      edges: collectAssignments(this.suitorList),
      adjacency,
    }
  }

  private addAgent(role: AgentRole, name?: AgentName): Agent {
    const side = role === 'suitor' ? this.suitorList : this.reviewerList
    const others = role === 'suitor' ? this.reviewerList : this.suitorList

    const agent = new Agent(name ?? side.length, role, others.length)
    side.push(agent)

    for (const other of others) {
      other.resetPreferences(side.length)
    }
    return agent
  }

  private setPreferences(
    role: AgentRole,
    name: AgentName,
    targetNames: readonly AgentName[]
  ): void {
    const side = role === 'suitor' ? this.suitorList : this.reviewerList
    const others = role === 'suitor' ? this.reviewerList : this.suitorList

    const agent = findByName(side, role, name)
    if (!agent) {
      throw new UnknownAgentError(role, name)
    }
    agent.setPreferences(resolveNames(others, oppositeRole(role), targetNames, agent))
  }

  private populate(suitors: PreferenceEntries, reviewers: PreferenceEntries): void {
    for (const [name] of suitors) {
      this.addSuitor(name)
    }
    for (const [name] of reviewers) {
      this.addReviewer(name)
    }

    suitors.forEach(([, preferences], i) => {
      const suitor = this.suitorList[i]
      suitor.setPreferences(resolveNames(this.reviewerList, 'reviewer', preferences, suitor))
    })
    reviewers.forEach(([, preferences], i) => {
      const reviewer = this.reviewerList[i]
      reviewer.setPreferences(resolveNames(this.suitorList, 'suitor', preferences, reviewer))
    })
  }
}

function findByName(
  agents: readonly Agent[],
  role: AgentRole,
  name: AgentName
): Agent | undefined {
  const key = agentKey(role, name)
  return agents.find((agent) => agent.key === key)
}

function resolveNames(
  candidates: readonly Agent[],
  role: AgentRole,
  names: readonly AgentName[],
  owner: Agent
): Agent[] {
  return names.map((name) => {
    const agent = findByName(candidates, role, name)
    if (!agent) {
      throw new UnknownAgentError(role, name, { rankedBy: owner.key })
    }
    return agent
  })
}

/**
 * Translates each agent's preferences into positions within `targets`.
 */
function toPositions(
  agents: readonly Agent[],
  targets: readonly Agent[]
): number[][] {
  const positions = new Map(
    targets.map((target, index): [string, number] => [target.key, index])
  )

  return agents.map((agent) => {
    const preferences = agent.preferences
    if (preferences === null) {
      throw new IncompletePreferencesError(agent.role, agent.name, 'preferences are unset')
    }
    return preferences.map((target) => {
      const position = positions.get(target.key)
      if (position === undefined) {
        throw new IncompletePreferencesError(
          agent.role,
          agent.name,
          `ranks unknown ${target.role} ${String(target.name)}`
        )
      }
      return position
    })
  })
}
