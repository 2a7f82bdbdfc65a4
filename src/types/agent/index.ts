export type * from './self-concept.js';
export { GOAL_STATUSES, cloneSelfConcept } from './self-concept.js';
