import { createSilentLogger, type Logger } from '../utils/logger'

/**
 * Preference lists of both sides as positions into the other side's collection.
 */
export interface EngineInput {
  /** For each proposer, receiver positions ranked best to worst */
  proposerPreferences: ReadonlyArray<readonly number[]>
  /** For each receiver, proposer positions ranked best to worst */
  receiverPreferences: ReadonlyArray<readonly number[]>
}

/**
 * Pairing computed by the engine, by position. `null` marks an unassigned agent.
 */
export interface EngineOutcome {
  proposerPartners: Array<number | null>
  receiverPartners: Array<number | null>
  proposals: number
  rejections: number
  breakups: number
}

/**
 * Deferred acceptance over index-based working copies.
 *
 * The engine never sees agent objects: callers translate their preference lists
 * to positions, run the engine, then map the outcome back. Proposers are served
 * in collection order, always the first unassigned one with targets left, and
 * each proposer proposes to each receiver at most once.
 */
export class MatchingEngine {
  constructor(private logger: Logger = createSilentLogger()) {}

  /**
   * Runs the proposal loop to completion.
   *
   * @param input - Preference lists of both sides
   * @returns Partners by position plus proposal counters
   */
  run(input: EngineInput): EngineOutcome {
    const { proposerPreferences, receiverPreferences } = input
    const ranks = receiverPreferences.map(buildRankTable)
    const nextChoice: number[] = proposerPreferences.map(() => 0)
    const proposerPartners: Array<number | null> = proposerPreferences.map(() => null)
    const receiverPartners: Array<number | null> = receiverPreferences.map(() => null)

    let proposals = 0
    let rejections = 0
    let breakups = 0

    for (
      let proposer = findFreeProposer(proposerPreferences, proposerPartners, nextChoice);
      proposer !== null;
      proposer = findFreeProposer(proposerPreferences, proposerPartners, nextChoice)
    ) {
      const receiver = proposerPreferences[proposer][nextChoice[proposer]]
      nextChoice[proposer]++
      proposals++

      const current = receiverPartners[receiver]
      if (current === null) {
        receiverPartners[receiver] = proposer
        proposerPartners[proposer] = receiver
      } else if (ranksBetter(ranks[receiver], proposer, current)) {
        this.logger.debug('Receiver traded up', {
          receiver,
          previous: current,
          next: proposer,
        })
        proposerPartners[current] = null
        receiverPartners[receiver] = proposer
        proposerPartners[proposer] = receiver
        breakups++
      } else {
        rejections++
      }
    }

    return { proposerPartners, receiverPartners, proposals, rejections, breakups }
  }

  /**
   * Lists `[proposer, receiver]` positions that would both rather be together
   * than with their partners in `outcome`.
   */
  blockingPairs(input: EngineInput, outcome: EngineOutcome): Array<[number, number]> {
    const ranks = input.receiverPreferences.map(buildRankTable)
    const pairs: Array<[number, number]> = []

    input.proposerPreferences.forEach((preferences, proposer) => {
      const partner = outcome.proposerPartners[proposer]
      const partnerRank = partner === null ? -1 : preferences.indexOf(partner)
      const limit = partnerRank === -1 ? preferences.length : partnerRank

      for (const receiver of preferences.slice(0, limit)) {
        const current = outcome.receiverPartners[receiver]
        if (current === null || ranksBetter(ranks[receiver], proposer, current)) {
          pairs.push([proposer, receiver])
        }
      }
    })

    return pairs
  }
}

/**
 * Maps each ranked position to its rank so receivers compare in constant time.
 */
function buildRankTable(preferences: readonly number[]): Map<number, number> {
  return new Map(preferences.map((position, rank): [number, number] => [position, rank]))
}

function ranksBetter(
  ranks: Map<number, number>,
  candidate: number,
  current: number
): boolean {
  const candidateRank = ranks.get(candidate)
  const currentRank = ranks.get(current)
  if (candidateRank === undefined) {
    return false
  }
  return currentRank === undefined || candidateRank < currentRank
}

function findFreeProposer(
  preferences: ReadonlyArray<readonly number[]>,
  partners: ReadonlyArray<number | null>,
  nextChoice: readonly number[]
): number | null {
  for (let proposer = 0; proposer < partners.length; proposer++) {
    if (partners[proposer] === null && nextChoice[proposer] < preferences[proposer].length) {
      return proposer
    }
  }
  return null
}
