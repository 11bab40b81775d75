import vm from 'node:vm';
import { RuleCancelledError, ScriptError, type ScriptEntry } from '../errors.js';
import { CAPABILITY_NAMES, type RuleCapabilities } from '../core/rule-context.js';
import type { CompiledScript, CompileOptions, ScriptExecutor } from './types.js';

/**
 * Compiles rule scripts into async functions whose parameters are exactly
 * the rule capabilities (`device`, `scene`, `allOf`, `waitFor`, ...).
 *
 * A script is either a single expression, whose value is the result:
 *
 * ```
 * device("7").attribute("motion").eq("active")
 * ```
 *
 * or an async function body that may `await` and `return`:
 *
 * ```
 * await device("12").sendCommand("on");
 * await wait("5m");
 * await device("12").sendCommand("off");
 * ```
 *
 * Scripts run in the host realm; nothing is sandboxed.
 */
export class VmScriptExecutor implements ScriptExecutor {
  private readonly functions = new WeakMap<CompiledScript, Function>();

  compile(source: string, entry: ScriptEntry, options: CompileOptions): CompiledScript {
    const filename = `${options.ruleName}.${entry}.js`;
    let fn: Function;

    try {
      fn = compileBody(`return (async () => (\n${source.trim().replace(/;+$/, '')}\n))();`, filename);
    } catch {
      try {
        fn = compileBody(`return (async () => {\n${source}\n})();`, filename);
      } catch (error) {
        throw new ScriptError(
          `Rule "${options.ruleName}" ${entry} script does not compile: ${error instanceof Error ? error.message : String(error)}`,
          { ruleName: options.ruleName, entry, cause: error }
        );
      }
    }

    const script: CompiledScript = Object.freeze({ ruleName: options.ruleName, entry, source });
    this.functions.set(script, fn);
    return script;
  }

  async invoke(script: CompiledScript, capabilities: RuleCapabilities): Promise<unknown> {
    const fn = this.functions.get(script);
    if (!fn) {
      throw new ScriptError(
        `Rule "${script.ruleName}" ${script.entry} script was not compiled by this executor`,
        { ruleName: script.ruleName, entry: script.entry }
      );
    }

    const args = CAPABILITY_NAMES.map(name => capabilities[name]);
    try {
      const result: unknown = await Reflect.apply(fn, undefined, args);
      return result;
    } catch (error) {
      if (error instanceof RuleCancelledError) throw error;
      throw ScriptError.from(error, script.ruleName, script.entry);
    }
  }
}

function compileBody(body: string, filename: string): Function {
  return vm.compileFunction(body, [...CAPABILITY_NAMES], { filename });
}
