/**
 * Algorithms Export
 */

export {
  Metrics,
  findMajority,
  validateInput,
  hasError,
  formatMetrics,
  formatVoteResult,
} from './majority-vote.js';
export type {
  VoteResult,
  VoteSuccess,
  VoteFailure,
  FindMajorityOptions,
  MajorityFinder,
} from './majority-vote.js';
export { generateTestArray, shuffleArray, MAJORITY_SENTINEL } from './test-data.js';
