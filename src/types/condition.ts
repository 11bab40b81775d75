import type { Duration } from './timer.js';

/** Variant tag of a condition node */
export type ConditionKind =
  | 'attribute'           // Device attribute vs static operand
  | 'device_comparison'   // Device attribute vs another device attribute
  | 'all_of'
  | 'any_of'
  | 'not'
  | 'change'              // Attribute differs from its registration snapshot
  | 'scene_set'           // All scene requirements hold
  | 'scene_change';       // Scene membership differs from its registration snapshot

/** Comparison operator of attribute conditions */
export type ComparisonOperator =
  | 'eq' | 'neq'                              // Equality
  | 'gt' | 'gte' | 'lt' | 'lte'              // Ordering (numbers, strings)
  | 'in' | 'not_in'                          // Membership
  | 'contains'                                // Substring
  | 'matches';                                // Regex

/** Timing constraints applied when a condition tree is registered */
export interface ConditionTiming {
  /** Give up waiting after this long */
  timeout?: Duration | undefined;
  /** Require the tree to stay true this long before it fires */
  forDuration?: Duration | undefined;
}
