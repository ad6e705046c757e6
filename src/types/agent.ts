/**
 * Identifier of a suitor or reviewer.
 * Names only need to be unique within their own side.
 */
export type AgentName = string | number

/**
 * Which side of the game an agent belongs to.
 * - `'suitor'`: proposes in the default solve
 * - `'reviewer'`: receives proposals in the default solve
 */
export type AgentRole = 'suitor' | 'reviewer'

/**
 * Preference list of an agent.
 *
 * `'unset'` is the placeholder an agent falls back to whenever the opposite side
 * changes size. It carries the length a complete list would need and is never
 * confused with a list that was set to an empty array.
 *
 * @typeParam A - The agent type referenced by the list
 */
export type PreferenceState<A> =
  | { status: 'unset'; length: number }
  | { status: 'set'; agents: readonly A[] }

/**
 * Preferences for one side keyed by agent name, each value ranked best to worst.
 * Plain objects carry string names, and numbers in their lists are read as the
 * matching strings. Use a Map to keep numeric names.
 */
export type PreferenceMapping =
  | ReadonlyMap<AgentName, readonly AgentName[]>
  | Readonly<Record<string, readonly AgentName[]>>

/**
 * Input accepted by the MatchingGame constructor: an agent count per side, or the
 * suitor and reviewer preference mappings.
 */
export type MatchingGameGenerator =
  | number
  | readonly [PreferenceMapping, PreferenceMapping]
