import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { DeviceHandle } from '../../../src/core/rule-context';
import { RuleCancelledError, ScriptError } from '../../../src/errors';
import { VmScriptExecutor } from '../../../src/scripting/vm-script-executor';
import type { RuleCapabilities } from '../../../src/core/rule-context';
import { createContext, createHarness, type Harness } from '../../helpers/harness';

describe('VmScriptExecutor', () => {
  let harness: Harness;
  let executor: VmScriptExecutor;
  let capabilities: RuleCapabilities;

  beforeEach(async () => {
    vi.useFakeTimers();
    harness = await createHarness();
    executor = new VmScriptExecutor();
    capabilities = createContext(harness, 'porch').capabilities();
  });

  afterEach(async () => {
    await harness.stop();
    vi.useRealTimers();
  });

  it('returns the value of an expression script', async () => {
    const script = executor.compile('1 + 2', 'action', { ruleName: 'porch' });

    await expect(executor.invoke(script, capabilities)).resolves.toBe(3);
  });

  it('tolerates a trailing semicolon after an expression', async () => {
    const script = executor.compile('device(7);', 'trigger', { ruleName: 'porch' });
    const result = await executor.invoke(script, capabilities);

    expect(result).toBeInstanceOf(DeviceHandle);
  });

  it('runs function bodies with statements and return', async () => {
    const script = executor.compile([
      'const handle = device(12);',
      'await wait(0);',
      'return handle.id;',
    ].join('\n'), 'action', { ruleName: 'porch' });

    const result = executor.invoke(script, capabilities);
    await vi.advanceTimersByTimeAsync(0);

    await expect(result).resolves.toBe('12');
  });

  it('exposes the capabilities as free functions', async () => {
    harness.cache.set('1', 'x', 5);
    const script = executor.compile('check(allOf(device(1).attribute("x").gt(3), isNot(device(1).attribute("x").eq(9))))', 'action', {
      ruleName: 'porch',
    });

    await expect(executor.invoke(script, capabilities)).resolves.toBe(true);
  });

  it('keeps the compiled script identity', () => {
    const script = executor.compile('1', 'timer', { ruleName: 'porch' });

    expect(script).toEqual({ ruleName: 'porch', entry: 'timer', source: '1' });
    expect(Object.isFrozen(script)).toBe(true);
  });

  it('rejects source that does not compile', () => {
    expect(() => executor.compile('this is not (', 'trigger', { ruleName: 'porch' }))
      .toThrow(/^Rule "porch" trigger script does not compile: /);
  });

  it('wraps runtime failures in a ScriptError', async () => {
    const script = executor.compile('throw new Error("boom")', 'action', { ruleName: 'porch' });

    const failure = executor.invoke(script, capabilities);

    await expect(failure).rejects.toThrow(ScriptError);
    await expect(failure).rejects.toMatchObject({
      message: 'Rule "porch" action script failed: boom',
      ruleName: 'porch',
      entry: 'action',
    });
  });

  it('lets a cancellation through unchanged', async () => {
    const controller = new AbortController();
    controller.abort();
    const cancelled = createContext(harness, 'porch', controller.signal).capabilities();
    const script = executor.compile('await wait("1s")', 'action', { ruleName: 'porch' });

    await expect(executor.invoke(script, cancelled)).rejects.toThrow(RuleCancelledError);
  });

  it('refuses scripts compiled elsewhere', async () => {
    const foreign = new VmScriptExecutor().compile('1', 'action', { ruleName: 'porch' });

    await expect(executor.invoke(foreign, capabilities))
      .rejects.toThrow('Rule "porch" action script was not compiled by this executor');
  });
});
