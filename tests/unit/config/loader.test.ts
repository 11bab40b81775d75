import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { loadConfigFromFile, loadConfigFromYAML } from '../../../src/config/loader';
import { ConfigValidationError } from '../../../src/errors';

const fixture = fileURLToPath(new URL('../../fixtures/automation.yaml', import.meta.url));

describe('loadConfigFromFile', () => {
  it('loads engine settings, scenes and rules', async () => {
    const document = await loadConfigFromFile(fixture);

    expect(document.engine).toEqual({ name: 'cottage', retryDelayMs: 10_000, maxTimers: 500 });
    expect(document.audit).toEqual({ maxMemoryEntries: 1000, batchSize: 20 });
    expect(document.scenes).toEqual([
      {
        name: 'evening',
        description: 'Dim the living room',
        deviceStates: [
          { deviceId: '1', attribute: 'switch', value: 'on', command: 'on', arguments: [] },
          { deviceId: '2', attribute: 'level', value: 30, command: 'setLevel', arguments: [30] },
        ],
      },
    ]);
    expect(document.rules.map(rule => [rule.name, rule.kind])).toEqual([
      ['hall-motion', 'condition'],
      ['morning-blinds', 'scheduled'],
    ]);
    expect(document.rules[0]?.action).toBe(
      'await device(34).sendCommand("on");\nawait wait("5m");\nawait device(34).sendCommand("off");\n',
    );
    expect(document.rules[1]?.trigger).toBe('"07:30"');
  });

  it('reports a missing file with its path', async () => {
    await expect(loadConfigFromFile('/nonexistent/automation.yaml')).rejects.toMatchObject({
      name: 'ConfigValidationError',
      path: '/nonexistent/automation.yaml',
    });
  });
});

describe('loadConfigFromYAML', () => {
  it('accepts a document with rules only', () => {
    const document = loadConfigFromYAML([
      'rules:',
      '  - name: porch',
      '    trigger: device(1).attribute("x").changes()',
      '    action: await device(2).sendCommand("toggle")',
    ].join('\n'));

    expect(document).toEqual({
      engine: {},
      scenes: [],
      rules: [
        {
          name: 'porch',
          kind: 'condition',
          trigger: 'device(1).attribute("x").changes()',
          action: 'await device(2).sendCommand("toggle")',
        },
      ],
    });
  });

  it('rejects empty content', () => {
    expect(() => loadConfigFromYAML('')).toThrow('config: YAML content is empty');
  });

  it('rejects a YAML syntax error', () => {
    expect(() => loadConfigFromYAML('rules: [unclosed', 'home.yaml')).toThrow(ConfigValidationError);
    expect(() => loadConfigFromYAML('rules: [unclosed', 'home.yaml')).toThrow(/^home\.yaml: YAML syntax error: /);
  });

  it('reports validation errors with their path', () => {
    const yaml = [
      'rules:',
      '  - name: porch',
      '    trigger: 42',
      '    action: "null"',
    ].join('\n');

    expect(() => loadConfigFromYAML(yaml)).toThrow('rules[0].trigger: must be a non-empty string, got number');
  });
});
