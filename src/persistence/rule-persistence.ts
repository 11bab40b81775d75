import type { StorageAdapter, PersistedState, StateMetadata } from '@hamicek/noex';
import type { RuleDefinition, RuleKind } from '../types/rule.js';

export interface RulePersistenceOptions {
  /** Storage key (default: 'rules') */
  key?: string;
  /** Schema version; a stored document of another version is ignored (default: 1) */
  schemaVersion?: number;
}

interface RulesState {
  rules: RuleDefinition[];
}

const RULE_KINDS: ReadonlySet<RuleKind> = new Set(['condition', 'scheduled']);

/**
 * Stores the identity of installed rules (name, kind, trigger, action) so
 * the coordinator can reinstall them after a restart.
 */
export class RulePersistence {
  private readonly adapter: StorageAdapter;
  private readonly key: string;
  private readonly schemaVersion: number;

  constructor(adapter: StorageAdapter, options?: RulePersistenceOptions) {
    this.adapter = adapter;
    this.key = options?.key ?? 'rules';
    this.schemaVersion = options?.schemaVersion ?? 1;
  }

  /**
   * Replaces the stored rule set. Runtime bookkeeping is not stored.
   */
  async save(rules: readonly RuleDefinition[]): Promise<void> {
    const state: RulesState = { rules: rules.map(toDefinition) };
    const metadata: StateMetadata = {
      persistedAt: Date.now(),
      serverId: 'rule-coordinator',
      schemaVersion: this.schemaVersion,
    };

    const persisted: PersistedState<RulesState> = {
      state,
      metadata,
    };

    await this.adapter.save(this.key, persisted);
  }

  /**
   * Loads the stored rule set. Empty when nothing is stored, the schema
   * version differs, or an entry is malformed.
   */
  async load(): Promise<RuleDefinition[]> {
    const result = await this.adapter.load<RulesState>(this.key);
    if (!result) {
      return [];
    }

    if (result.metadata.schemaVersion !== this.schemaVersion) {
      return [];
    }

    return result.state.rules.filter(isRuleDefinition).map(toDefinition);
  }

  async clear(): Promise<boolean> {
    return this.adapter.delete(this.key);
  }

  async exists(): Promise<boolean> {
    return this.adapter.exists(this.key);
  }

  getKey(): string {
    return this.key;
  }

  getSchemaVersion(): number {
    return this.schemaVersion;
  }
}

function toDefinition(rule: RuleDefinition): RuleDefinition {
  return {
    name: rule.name,
    kind: rule.kind,
    trigger: rule.trigger,
    action: rule.action,
    ...(rule.description !== undefined && { description: rule.description }),
  };
}

function isRuleDefinition(value: RuleDefinition): boolean {
  return typeof value.name === 'string' &&
    RULE_KINDS.has(value.kind) &&
    typeof value.trigger === 'string' &&
    typeof value.action === 'string';
}
