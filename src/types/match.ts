import type { Agent } from '../core/agent'

/**
 * Solved pairing handed to consumers: every agent of both sides mapped to a
 * one-element list holding its partner.
 */
export type MatchingResult = Map<Agent, readonly [Agent]>

/**
 * Two-sided view of a solved game for graph or visualization consumers.
 */
export interface BipartiteMatching {
  /** Suitors in registry order */
  left: readonly Agent[]
  /** Reviewers in registry order */
  right: readonly Agent[]
  /** One `[suitor, reviewer]` edge per pair */
  edges: ReadonlyArray<readonly [Agent, Agent]>
  /** Same mapping `solve()` returns */
  adjacency: MatchingResult
}

/**
 * A suitor and reviewer who both prefer each other to their current partners.
 */
export interface BlockingPair {
  suitor: Agent
  reviewer: Agent
}

/**
 * Options for a single solve.
 */
export interface SolveOptions {
  /** Let reviewers propose instead of suitors (default: false) */
  invert?: boolean
}

/**
 * Summary of the latest successful solve.
 */
export interface SolveReport {
  /** Correlation ID, also attached to the solve's log lines */
  id: string
  /** Whether reviewers were the proposing side */
  invert: boolean
  /** Number of agents per side */
  size: number
  /** Proposals made, never more than size² */
  proposals: number
  /** Proposals turned down by an already paired receiver */
  rejections: number
  /** Pairs broken because the receiver traded up */
  breakups: number
  /** Wall time of the proposal loop and commit */
  durationMs: number
  /** When the solve finished */
  solvedAt: Date
}
