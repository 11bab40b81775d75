/** How a rule decides when to run its action */
export type RuleKind = 'condition' | 'scheduled';

/** Lifecycle status of a rule */
export type RuleStatus = 'installing' | 'active' | 'removed';

/**
 * Rule identity - everything needed to reconstruct a rule after a reload.
 *
 * For `condition` rules `trigger` holds the trigger definition, for
 * `scheduled` rules the timer provider.
 */
export interface RuleDefinition {
  name: string;
  kind: RuleKind;
  trigger: string;
  action: string;
  description?: string;
}

/** Installed rule with runtime bookkeeping */
export interface Rule extends RuleDefinition {
  status: RuleStatus;
  installedAt: number;
  cycles: number;           // Completed trigger/schedule cycles
  failures: number;         // Failed script invocations
  lastFiredAt?: number;
  lastError?: string;
}
