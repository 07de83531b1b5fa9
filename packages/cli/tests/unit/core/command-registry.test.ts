import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import { ConfigurationError, ValidationError } from '@retirecheck/utils';
import { CommandRegistry } from '../../../src/core/command-registry.js';
import type { CommandDefinition } from '../../../src/types/index.js';

function command(name: string, description = `${name} command`): CommandDefinition {
  return {
    name,
    description,
    schema: z.object({}),
    handler: () => ({ ok: true }),
    examples: [`retirecheck demo ${name}`],
  };
}

describe('CommandRegistry', () => {
  let registry: CommandRegistry;

  beforeEach(() => {
    registry = new CommandRegistry();
  });

  it('looks commands up by package and name', () => {
    const run = command('run');
    registry.registerPackage({ packageName: 'demo', description: 'Demo', commands: [run] });

    expect(registry.getCommand('demo', 'run')).toBe(run);
    expect(registry.getCommand('demo', 'missing')).toBeUndefined();
    expect(registry.getPackageCommands('demo')).toEqual([run]);
    expect(registry.getPackageCommands('other')).toEqual([]);
    expect(registry.getPackages().map((p) => p.packageName)).toEqual(['demo']);
  });

  it('rejects a package registered twice', () => {
    registry.registerPackage({ packageName: 'demo', description: 'Demo', commands: [] });

    expect(() =>
      registry.registerPackage({ packageName: 'demo', description: 'Demo', commands: [] })
    ).toThrow(ConfigurationError);
  });

  it('rejects duplicate command names within a package', () => {
    expect(() =>
      registry.registerPackage({
        packageName: 'demo',
        description: 'Demo',
        commands: [command('run'), command('run')],
      })
    ).toThrow('Command demo.run is already registered');
    expect(registry.getPackages()).toEqual([]);
  });

  it('rejects commands without a description', () => {
    expect(() =>
      registry.registerPackage({
        packageName: 'demo',
        description: 'Demo',
        commands: [command('run', '  ')],
      })
    ).toThrow(ValidationError);
  });

  it('generates package help', () => {
    registry.registerPackage({ packageName: 'demo', description: 'Demo', commands: [command('run')] });

    expect(registry.generatePackageHelp('demo')).toBe(
      [
        'Demo',
        '',
        'Commands:',
        `  ${'run'.padEnd(20)} run command`,
        '    Example: retirecheck demo run',
      ].join('\n')
    );
    expect(registry.generatePackageHelp('nope')).toBe('Package nope not found');
  });
});
