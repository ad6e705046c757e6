/**
 * Quick Start Example
 *
 * This example demonstrates the most basic usage of stable-pairing. It shows how to:
 * - Declare suitors and reviewers with ranked preferences
 * - Solve the game with suitors proposing, then with reviewers proposing
 * - Check the result for blocking pairs
 * - Hand the pairing to a graph consumer
 */

import { StablePairing, defaultLogger, findBlockingPairs } from '../src'

// Configure the game using the fluent builder API
const game = StablePairing.create()
  .suitor('J', ['A', 'D', 'C', 'B'])
  .suitor('K', ['A', 'B', 'C', 'D'])
  .suitor('L', ['B', 'D', 'C', 'A'])
  .suitor('M', ['C', 'A', 'B', 'D'])
  .reviewer('A', ['L', 'J', 'K', 'M'])
  .reviewer('B', ['J', 'M', 'L', 'K'])
  .reviewer('C', ['K', 'M', 'L', 'J'])
  .reviewer('D', ['M', 'K', 'J', 'L'])
  .logger(defaultLogger)
  .build()

// Suitors propose: every suitor gets its best stable partner
const matching = game.solve()
for (const [agent, [partner]] of matching) {
  if (agent.role === 'suitor') {
    console.log(`${agent} - ${partner}`)
  }
}

console.log('Blocking pairs:', findBlockingPairs(game.suitors, game.reviewers).length)
console.log('Proposals made:', game.lastReport?.proposals)

// Reviewers propose: every reviewer gets its best stable partner instead
game.solve({ invert: true })

// The bipartite view is what graph and visualization tools consume
const graph = game.toBipartite()
for (const [suitor, reviewer] of graph.edges) {
  console.log(`${suitor} - ${reviewer}`)
}
