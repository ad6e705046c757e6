import { describe, it, expect, vi, afterEach } from 'vitest'
import { MatchingGame } from '../../../src/core/matching-game'
import { MatchingEngine } from '../../../src/core/engine'
import {
  GroupSizeMismatchError,
  IncompletePreferencesError,
  InvalidGeneratorError,
  UnknownAgentError,
  UnsolvedGameError,
  UnstableMatchingError,
} from '../../../src/core/matching-error'
import type { Logger } from '../../../src/utils/logger'
import {
  suitorPreferences,
  reviewerPreferences,
  numericPreferences,
  partnerNames,
} from '../../fixtures/preferences'

function createGame(): MatchingGame {
  return new MatchingGame([suitorPreferences, reviewerPreferences])
}

function createLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

describe('MatchingGame', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('constructor', () => {
    it('creates numbered agents from a count', () => {
      const game = new MatchingGame(3)

      expect(game.suitors.map((agent) => agent.name)).toEqual([0, 1, 2])
      expect(game.reviewers.map((agent) => agent.name)).toEqual([0, 1, 2])
      expect(game.suitors[0].preferenceState).toEqual({ status: 'unset', length: 3 })
      expect(game.reviewers[2].preferenceState).toEqual({ status: 'unset', length: 3 })
    })

    it('creates agents from preference mappings in key order', () => {
      const game = createGame()

      expect(game.suitors.map((agent) => agent.name)).toEqual(['J', 'K', 'L', 'M'])
      expect(game.reviewers.map((agent) => agent.name)).toEqual(['A', 'B', 'C', 'D'])
    })

    it('links preferences to the agents of the opposite side', () => {
      const game = createGame()
      const suitor = game.getSuitor('J')

      expect(suitor?.preferences?.map((agent) => agent.name)).toEqual(['A', 'D', 'C', 'B'])
      expect(suitor?.preferences?.[0]).toBe(game.reviewers[0])
    })

    it('keeps numeric names when given Maps', () => {
      const game = new MatchingGame(numericPreferences())

      expect(game.suitors.map((agent) => agent.key)).toEqual([
        'suitor:number:0',
        'suitor:number:1',
      ])
      expect(game.reviewers.map((agent) => agent.name)).toEqual([3, 4])
    })

    it('solves plain objects whose lists hold numbers', () => {
      const game = new MatchingGame([
        { 0: [3, 4], 1: [3, 4] },
        { 3: [0, 1], 4: [1, 0] },
      ])

      game.solve()

      expect(game.suitors.map((agent) => agent.key)).toEqual([
        'suitor:string:0',
        'suitor:string:1',
      ])
      expect(game.getSuitor('0')?.partner?.name).toBe('3')
      expect(game.getSuitor('1')?.partner?.name).toBe('4')
    })

    it('rejects a preference naming an unknown agent', () => {
      expect(
        () => new MatchingGame([{ J: ['A', 'Z'] }, { A: ['J'] }])
      ).toThrow(UnknownAgentError)
      expect(
        () => new MatchingGame([{ J: ['A', 'Z'] }, { A: ['J'] }])
      ).toThrow('Unknown reviewer: Z')
    })

    it('rejects malformed generators', () => {
      expect(() => new MatchingGame(-1)).toThrow(InvalidGeneratorError)
      expect(() => new MatchingGame(2.5)).toThrow(InvalidGeneratorError)
    })
  })

  describe('addSuitor / addReviewer', () => {
    it('names agents after their position by default', () => {
      const game = new MatchingGame(0)

      expect(game.addSuitor().name).toBe(0)
      expect(game.addSuitor().name).toBe(1)
      expect(game.addReviewer('A').name).toBe('A')
      expect(game.addReviewer().name).toBe(1)
    })

    it('resets the preferences of the opposite side only', () => {
      const game = createGame()

      game.addSuitor('N')

      for (const reviewer of game.reviewers) {
        expect(reviewer.preferenceState).toEqual({ status: 'unset', length: 5 })
      }
      expect(game.getSuitor('J')?.hasPreferences()).toBe(true)
      expect(game.getSuitor('N')?.preferenceState).toEqual({ status: 'unset', length: 4 })
    })

    it('does not check name collisions', () => {
      const game = new MatchingGame(0)
      game.addSuitor('J')
      game.addSuitor('J')

      expect(game.suitors).toHaveLength(2)
    })
  })

  describe('setSuitorPreferences / setReviewerPreferences', () => {
    it('populates a game created from a count', () => {
      const game = new MatchingGame(2)
      game.setSuitorPreferences(0, [1, 0])
      game.setSuitorPreferences(1, [1, 0])
      game.setReviewerPreferences(0, [0, 1])
      game.setReviewerPreferences(1, [0, 1])

      const matching = game.solve()

      expect(partnerNames(matching)).toEqual({
        'suitor:number:0': 1,
        'suitor:number:1': 0,
        'reviewer:number:0': 1,
        'reviewer:number:1': 0,
      })
    })

    it('rejects unknown agents and targets', () => {
      const game = new MatchingGame(2)

      expect(() => game.setSuitorPreferences(5, [0, 1])).toThrow('Unknown suitor: 5')
      expect(() => game.setReviewerPreferences(0, [0, '1'])).toThrow('Unknown suitor: 1')
    })
  })

  describe('solve', () => {
    it('computes the suitor-optimal stable matching', () => {
      const matching = createGame().solve()

      expect(partnerNames(matching)).toEqual({
        'suitor:string:J': 'A',
        'suitor:string:K': 'C',
        'suitor:string:L': 'D',
        'suitor:string:M': 'B',
        'reviewer:string:A': 'J',
        'reviewer:string:B': 'M',
        'reviewer:string:C': 'K',
        'reviewer:string:D': 'L',
      })
    })

    it('lets reviewers propose when inverted', () => {
      const matching = createGame().solve({ invert: true })

      expect(partnerNames(matching)).toEqual({
        'suitor:string:J': 'B',
        'suitor:string:K': 'C',
        'suitor:string:L': 'A',
        'suitor:string:M': 'D',
        'reviewer:string:A': 'L',
        'reviewer:string:B': 'J',
        'reviewer:string:C': 'K',
        'reviewer:string:D': 'M',
      })
    })

    it('keys the result by the game agents, suitors first', () => {
      const game = createGame()
      const matching = game.solve()

      expect([...matching.keys()]).toEqual([...game.suitors, ...game.reviewers])
      const [partner] = matching.get(game.suitors[0]) ?? []
      expect(partner).toBe(game.reviewers[0])
    })

    it('writes symmetric partners onto the agents', () => {
      const game = createGame()
      game.solve()

      for (const suitor of game.suitors) {
        expect(suitor.partner?.partner).toBe(suitor)
      }
    })

    it('solves numeric games', () => {
      const matching = new MatchingGame(numericPreferences()).solve()

      expect(partnerNames(matching)).toEqual({
        'suitor:number:0': 3,
        'suitor:number:1': 4,
        'reviewer:number:3': 0,
        'reviewer:number:4': 1,
      })
    })

    it('returns an empty mapping for an empty game', () => {
      const game = new MatchingGame(0)

      expect(game.solve().size).toBe(0)
      expect(game.isSolved()).toBe(true)
    })

    it('refuses to run with 3 suitors and 2 reviewers', () => {
      const game = new MatchingGame(0)
      game.addSuitor()
      game.addSuitor()
      game.addSuitor()
      game.addReviewer()
      game.addReviewer()

      expect(() => game.solve()).toThrow(GroupSizeMismatchError)
      expect(() => game.solve()).toThrow(
        'Must have the same number of reviewers as suitors (3 suitors, 2 reviewers)'
      )
    })

    it('refuses to run while preferences are unset', () => {
      expect(() => new MatchingGame(2).solve()).toThrow(IncompletePreferencesError)
    })

    it('refuses to run after the opposite side grew', () => {
      const game = createGame()
      game.addSuitor('N')
      game.addReviewer('E')

      expect(() => game.solve()).toThrow(
        'Suitor preferences incomplete for J: preferences are unset'
      )
    })

    it('leaves earlier partners in place when a solve is refused', () => {
      const game = createGame()
      game.solve()
      game.addSuitor('N')

      expect(() => game.solve()).toThrow(GroupSizeMismatchError)
      expect(game.getSuitor('J')?.partner?.name).toBe('A')
    })

    it('does not alter stored preferences', () => {
      const game = createGame()
      game.solve()
      game.solve({ invert: true })

      expect(game.getSuitor('M')?.preferences?.map((agent) => agent.name)).toEqual([
        'C',
        'A',
        'B',
        'D',
      ])
      expect(game.getReviewer('B')?.preferences?.map((agent) => agent.name)).toEqual([
        'J',
        'M',
        'L',
        'K',
      ])
    })

    it('returns the same pairing when solved twice', () => {
      const game = createGame()

      const first = partnerNames(game.solve())
      const second = partnerNames(game.solve())

      expect(second).toEqual(first)
    })

    it('records a report of the latest solve', () => {
      const game = createGame()
      expect(game.lastReport).toBeUndefined()

      game.solve()

      expect(game.lastReport).toMatchObject({
        invert: false,
        size: 4,
        proposals: 9,
        rejections: 3,
        breakups: 2,
      })
      expect(game.lastReport?.id).toMatch(
        /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/
      )
      expect(game.lastReport?.solvedAt).toBeInstanceOf(Date)
    })

    it('gives every solve its own report id', () => {
      const game = createGame()
      game.solve()
      const firstId = game.lastReport?.id
      game.solve()

      expect(game.lastReport?.id).not.toBe(firstId)
    })

    it('logs start, breakups and completion through the configured logger', () => {
      const logger = createLogger()
      const game = new MatchingGame([suitorPreferences, reviewerPreferences], { logger })

      game.solve()

      expect(logger.debug).toHaveBeenCalledWith('[matching-game] Solving matching game', {
        id: expect.any(String),
        invert: false,
        size: 4,
      })
      expect(logger.debug).toHaveBeenCalledWith('[matching-game] Receiver traded up', {
        receiver: 1,
        previous: 1,
        next: 2,
      })
      expect(logger.debug).toHaveBeenCalledTimes(3)
      expect(logger.info).toHaveBeenCalledTimes(1)
      expect(logger.info).toHaveBeenCalledWith(
        '[matching-game] Matching game solved',
        expect.objectContaining({ proposals: 9, rejections: 3, breakups: 2 })
      )
    })
  })

  describe('verifyStability', () => {
    it('accepts the pairing computed by the engine', () => {
      const game = new MatchingGame([suitorPreferences, reviewerPreferences], {
        verifyStability: true,
      })

      expect(() => game.solve()).not.toThrow()
      expect(game.isSolved()).toBe(true)
    })

    it('rejects an unstable pairing without committing it', () => {
      vi.spyOn(MatchingEngine.prototype, 'run').mockReturnValue({
        proposerPartners: [1, 0],
        receiverPartners: [1, 0],
        proposals: 2,
        rejections: 0,
        breakups: 0,
      })
      const logger = createLogger()
      const game = new MatchingGame(numericPreferences(), {
        verifyStability: true,
        logger,
      })

      try {
        game.solve()
        expect.fail('Should have thrown')
      } catch (error) {
        expect(error).toBeInstanceOf(UnstableMatchingError)
        if (error instanceof UnstableMatchingError) {
          expect(error.message).toBe('Matching is not stable: 1 blocking pair(s)')
          expect(error.context?.pairs).toEqual([{ suitor: 0, reviewer: 3 }])
        }
      }

      expect(game.suitors.every((agent) => agent.partner === null)).toBe(true)
      expect(game.reviewers.every((agent) => agent.partner === null)).toBe(true)
      expect(game.lastReport).toBeUndefined()
      expect(logger.error).toHaveBeenCalledTimes(1)
    })

    it('names the pair by side when reviewers propose', () => {
      vi.spyOn(MatchingEngine.prototype, 'run').mockReturnValue({
        proposerPartners: [1, 0],
        receiverPartners: [1, 0],
        proposals: 2,
        rejections: 0,
        breakups: 0,
      })
      const game = new MatchingGame(numericPreferences(), { verifyStability: true })

      expect(() => game.solve({ invert: true })).toThrow(UnstableMatchingError)
    })
  })

  describe('checkSolved / isSolved / resetPartners', () => {
    it('reports an unsolved game', () => {
      const game = createGame()

      expect(game.isSolved()).toBe(false)
      expect(() => game.checkSolved()).toThrow(UnsolvedGameError)
    })

    it('clears partners', () => {
      const game = createGame()
      game.solve()

      game.resetPartners()

      expect(game.isSolved()).toBe(false)
      expect(game.getReviewer('A')?.partner).toBeNull()
    })
  })

  describe('matching', () => {
    it('fails on an unsolved game', () => {
      expect(() => createGame().matching()).toThrow(
        'Game has not been solved yet: 8 agent(s) without a partner'
      )
    })

    it('returns the current pairing of a solved game', () => {
      const game = createGame()
      const solved = partnerNames(game.solve())

      expect(partnerNames(game.matching())).toEqual(solved)
    })
  })

  describe('toBipartite', () => {
    it('exposes both sides, the edges and the adjacency mapping', () => {
      const game = createGame()
      game.solve()

      const graph = game.toBipartite()

      expect(graph.left).toEqual(game.suitors)
      expect(graph.right).toEqual(game.reviewers)
      expect(graph.edges.map(([suitor, reviewer]) => `${suitor}-${reviewer}`)).toEqual([
        'J-A',
        'K-C',
        'L-D',
        'M-B',
      ])
      expect(graph.adjacency.size).toBe(8)
    })

    it('fails fast on an unsolved game instead of solving it', () => {
      const game = createGame()

      expect(() => game.toBipartite()).toThrow(UnsolvedGameError)
      expect(game.isSolved()).toBe(false)
    })
  })
})
