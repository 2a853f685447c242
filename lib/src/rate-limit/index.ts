/**
 * Rate Limiting Module
 *
 * Adaptive pacing of outbound calls against the remote quota.
 */

export * from './types.js';

export {
  RateGovernor,
  createRateGovernor,
  type HeaderBag,
  type RateGovernorDeps,
} from './governor.js';
