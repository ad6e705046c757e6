// Main entry point
export { StablePairing, MatchingGameBuilder } from './builder/game-builder'

// Core classes
export { MatchingGame } from './core/matching-game'
export { MatchingEngine } from './core/engine'
export type { EngineInput, EngineOutcome } from './core/engine'
export { Agent, agentKey, oppositeRole } from './core/agent'

// Stability analysis
export { findBlockingPairs, isStable } from './core/stability'

// Validation
export {
  parseGenerator,
  checkComplete,
  checkSolved,
  collectAssignments,
  isAgentName,
} from './core/validation'
export type { ParsedGenerator, PreferenceEntries } from './core/validation'

// Types - Agents
export type {
  AgentName,
  AgentRole,
  PreferenceState,
  PreferenceMapping,
  MatchingGameGenerator,
} from './types'

// Types - Matching
export type {
  MatchingResult,
  BipartiteMatching,
  BlockingPair,
  SolveOptions,
  SolveReport,
} from './types'

// Configuration
export type { MatchingGameOptions } from './types'
export {
  DEFAULT_MATCHING_GAME_OPTIONS,
  mergeGameOptions,
} from './builder/game-options'

// Logging
export type { Logger } from './utils/logger'
export {
  defaultLogger,
  createSilentLogger,
  createPrefixedLogger,
} from './utils/logger'

// Errors
export {
  MatchingGameError,
  InvalidGeneratorError,
  UnknownAgentError,
  DuplicateAgentError,
  GroupSizeMismatchError,
  IncompletePreferencesError,
  UnsolvedGameError,
  UnstableMatchingError,
} from './core/matching-error'
export {
  StablePairingError,
  MissingParameterError,
  InvalidParameterError,
  BuilderSequenceError,
  isStablePairingError,
} from './utils/errors'
