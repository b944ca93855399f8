import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { RequirementChecker, findExecutable, parseRequirements } from '../requirements/requirement-checker.js';
import { resolveModuleDependencies, findCycle } from '../requirements/dependencies.js';
import { ConfigurationError } from '../errors.js';
import { FakeShellRunner } from './helpers/fake-shell.js';

function createMockLogger(): Logger {
  const logger = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger as unknown as Logger;
}

describe('parseRequirements', () => {
  it('should return no clauses for a missing value', () => {
    expect(parseRequirements(undefined)).toEqual([]);
  });

  it('should split a combined mapping into clauses', () => {
    expect(parseRequirements({ env: 'HOME', installed: 'git', shell: 'true', timeout: 3 })).toEqual([
      { kind: 'env', variable: 'HOME' },
      { kind: 'installed', program: 'git' },
      { kind: 'shell', command: 'true', timeout: 3 },
    ]);
  });

  it('should accept a list of mappings', () => {
    expect(parseRequirements([{ module: 'fonts' }, { env: 'DISPLAY' }])).toEqual([
      { kind: 'module', module: 'fonts' },
      { kind: 'env', variable: 'DISPLAY' },
    ]);
  });

  it('should reject unknown keys', () => {
    expect(() => parseRequirements({ program: 'git' })).toThrow(ConfigurationError);
  });
});

describe('RequirementChecker', () => {
  let logger: Logger;
  let shell: FakeShellRunner;

  beforeEach(() => {
    logger = createMockLogger();
    shell = new FakeShellRunner((command) => (command === 'false' ? { exitCode: 1 } : {}));
  });

  it('should check environment variables against the given environment', async () => {
    const checker = new RequirementChecker({ logger, shell, env: { PRESENT: '1' } });

    expect(await checker.isSatisfied([{ kind: 'env', variable: 'PRESENT' }])).toBe(true);
    expect(await checker.isSatisfied([{ kind: 'env', variable: 'ABSENT' }])).toBe(false);
  });

  it('should run shell clauses with the default timeout', async () => {
    const checker = new RequirementChecker({ logger, shell, timeout: 1 });

    expect(await checker.isSatisfied([{ kind: 'shell', command: 'true' }], '/modules/x')).toBe(true);
    expect(await checker.isSatisfied([{ kind: 'shell', command: 'false' }])).toBe(false);
    expect(shell.commands[0]?.options.timeoutMs).toBe(1000);
    expect(shell.commands[0]?.options.cwd).toBe('/modules/x');
  });

  it('should honour a per-clause timeout', async () => {
    const checker = new RequirementChecker({ logger, shell, timeout: 1 });

    await checker.isSatisfied([{ kind: 'shell', command: 'true', timeout: 5 }]);

    expect(shell.commands[0]?.options.timeoutMs).toBe(5000);
  });

  it('should treat a timed out command as unmet and warn', async () => {
    const slow = new FakeShellRunner(() => ({ exitCode: null, timedOut: true }));
    const checker = new RequirementChecker({ logger, shell: slow });

    expect(await checker.isSatisfied([{ kind: 'shell', command: 'sleep 10' }])).toBe(false);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('should cache clause results', async () => {
    const checker = new RequirementChecker({ logger, shell });
    const clauses = [{ kind: 'shell', command: 'true' } as const];

    await checker.isSatisfied(clauses);
    await checker.isSatisfied(clauses);

    expect(shell.executed).toEqual(['true']);
  });

  it('should ignore module clauses', async () => {
    const checker = new RequirementChecker({ logger, shell });

    expect(await checker.isSatisfied([{ kind: 'module', module: 'missing' }])).toBe(true);
  });
});

describe('findExecutable', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'solstice-path-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should find executables on the search path only', () => {
    const tool = path.join(tmpDir, 'mytool');
    fs.writeFileSync(tool, '#!/bin/sh\n', { mode: 0o755 });
    fs.writeFileSync(path.join(tmpDir, 'notes'), 'plain', { mode: 0o644 });

    expect(findExecutable('mytool', tmpDir)).toBe(tool);
    expect(findExecutable('notes', tmpDir)).toBeNull();
    expect(findExecutable('mytool', '')).toBeNull();
  });
});

describe('resolveModuleDependencies', () => {
  it('should disable dependents of disabled modules transitively', () => {
    const result = resolveModuleDependencies(
      [
        { name: 'base', satisfied: false, dependsOn: [] },
        { name: 'middle', satisfied: true, dependsOn: ['base'] },
        { name: 'top', satisfied: true, dependsOn: ['middle'] },
        { name: 'other', satisfied: true, dependsOn: [] },
      ],
      new Set(['base', 'middle', 'top', 'other'])
    );

    expect([...result.enabled]).toEqual(['other']);
    expect(result.disabled.get('top')).toBe('missing module dependency "middle"');
  });

  it('should treat defined but unselected modules as unavailable', () => {
    const result = resolveModuleDependencies(
      [{ name: 'a', satisfied: true, dependsOn: ['b'] }],
      new Set(['a', 'b'])
    );

    expect(result.enabled.size).toBe(0);
  });

  it('should reject references to undefined modules', () => {
    expect(() =>
      resolveModuleDependencies([{ name: 'a', satisfied: true, dependsOn: ['ghost'] }], new Set(['a']))
    ).toThrow(ConfigurationError);
  });

  it('should reject requirement cycles', () => {
    const nodes = [
      { name: 'a', satisfied: true, dependsOn: ['b'] },
      { name: 'b', satisfied: true, dependsOn: ['a'] },
    ];

    expect(findCycle(nodes)).toEqual(['a', 'b', 'a']);
    expect(() => resolveModuleDependencies(nodes, new Set(['a', 'b']))).toThrow(/cycle/);
  });
});
