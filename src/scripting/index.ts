export type { CompiledScript, CompileOptions, ScriptExecutor } from './types.js';
export { VmScriptExecutor } from './vm-script-executor.js';
