export type {
  AgentName,
  AgentRole,
  PreferenceState,
  PreferenceMapping,
  MatchingGameGenerator,
} from './agent'

export type {
  MatchingResult,
  BipartiteMatching,
  BlockingPair,
  SolveOptions,
  SolveReport,
} from './match'

export type { MatchingGameOptions } from '../builder/game-options'
