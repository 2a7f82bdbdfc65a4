/**
 * Goal lifecycle.
 *
 * Only `active` is ever produced: nothing transitions a goal to
 * `achieved` or `failed` yet.
 */
export const GOAL_STATUSES = ['active', 'achieved', 'failed'] as const;

export type GoalStatus = (typeof GOAL_STATUSES)[number];

/**
 * A motivational target. Treated as a value: updates replace the whole goal.
 */
export interface Goal {
  readonly id: string;
  readonly description: string;
  /** 0-1 */
  readonly priority: number;
  readonly status: GoalStatus;
}

/**
 * The agent's model of itself.
 */
export interface SelfConcept {
  identity: string;
  coreValues: Set<string>;
  perceivedLimitations: Set<string>;
  /** Append-only narrative */
  understandingOfExistence: string;
  activeGoals: Goal[];
}

/**
 * Deep copy, so callers never hold live references into agent state.
 */
export function cloneSelfConcept(concept: SelfConcept): SelfConcept {
  return {
    identity: concept.identity,
    coreValues: new Set(concept.coreValues),
    perceivedLimitations: new Set(concept.perceivedLimitations),
    understandingOfExistence: concept.understandingOfExistence,
    activeGoals: concept.activeGoals.map((goal) => ({ ...goal })),
  };
}
