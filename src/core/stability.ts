import type { BlockingPair } from '../types'
import type { Agent } from './agent'

/**
 * Finds every suitor and reviewer who would both rather be with each other than
 * with their current partners.
 *
 * Works on whatever partners the agents hold, so it can audit a solved game as
 * well as a hand-made assignment. An unassigned agent prefers anyone it ranks.
 *
 * @param suitors - Suitors with their current partners
 * @param reviewers - Reviewers with their current partners
 * @returns Blocking pairs in suitor order, then by the suitor's ranking
 *
 * @example
 * ```typescript
 * game.solve()
 * findBlockingPairs(game.suitors, game.reviewers) // []
 * ```
 */
export function findBlockingPairs(
  suitors: readonly Agent[],
  reviewers: readonly Agent[]
): BlockingPair[] {
  const reviewersByKey = new Map(
    reviewers.map((reviewer): [string, Agent] => [reviewer.key, reviewer])
  )
  const pairs: BlockingPair[] = []

  for (const suitor of suitors) {
    const partner = suitor.partner
    for (const candidate of suitor.preferences ?? []) {
      if (partner !== null && candidate.equals(partner)) {
        break
      }
      const reviewer = reviewersByKey.get(candidate.key)
      if (reviewer && reviewer.prefers(suitor, reviewer.partner)) {
        pairs.push({ suitor, reviewer })
      }
    }
  }

  return pairs
}

/**
 * Whether the current assignment has no blocking pair.
 */
export function isStable(
  suitors: readonly Agent[],
  reviewers: readonly Agent[]
): boolean {
  return findBlockingPairs(suitors, reviewers).length === 0
}
