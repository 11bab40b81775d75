import type { ScriptEntry } from '../errors.js';
import type { RuleCapabilities } from '../core/rule-context.js';

/** Script compiled for one entry of one rule */
export interface CompiledScript {
  readonly ruleName: string;
  readonly entry: ScriptEntry;
  readonly source: string;
}

export interface CompileOptions {
  ruleName: string;
}

/**
 * Script execution collaborator.
 *
 * `compile` rejects malformed source up front; `invoke` runs a compiled
 * script with the capability set of one rule run. Both report failures as
 * ScriptError.
 */
export interface ScriptExecutor {
  compile(source: string, entry: ScriptEntry, options: CompileOptions): CompiledScript;
  invoke(script: CompiledScript, capabilities: RuleCapabilities): Promise<unknown>;
}
