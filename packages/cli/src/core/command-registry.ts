/**
 * Command Registry - Command lookup for the commander wiring
 */

import type { CommandDefinition, PackageCommandModule } from '../types/index.js';
import { ConfigurationError, ValidationError } from '@retirecheck/utils';

export class CommandRegistry {
  private packages: Map<string, PackageCommandModule> = new Map();
  private commands: Map<string, CommandDefinition> = new Map();

  /**
   * Register a package command module
   */
  registerPackage(module: PackageCommandModule): void {
    if (this.packages.has(module.packageName)) {
      throw new ConfigurationError(
        `Package ${module.packageName} is already registered`,
        'packageName',
        { packageName: module.packageName }
      );
    }

    const seen = new Set<string>();
    for (const command of module.commands) {
      this.validateCommand(command);
      const fullName = `${module.packageName}.${command.name}`;
      if (this.commands.has(fullName) || seen.has(fullName)) {
        throw new ConfigurationError(`Command ${fullName} is already registered`, 'commandName', {
          packageName: module.packageName,
          commandName: command.name,
        });
      }
      seen.add(fullName);
    }

    this.packages.set(module.packageName, module);
    for (const command of module.commands) {
      this.commands.set(`${module.packageName}.${command.name}`, command);
    }
  }

  /**
   * Get a command by full name (package.command)
   */
  getCommand(packageName: string, commandName: string): CommandDefinition | undefined {
    return this.commands.get(`${packageName}.${commandName}`);
  }

  getPackageCommands(packageName: string): CommandDefinition[] {
    const module = this.packages.get(packageName);
    return module?.commands ?? [];
  }

  getPackages(): PackageCommandModule[] {
    return Array.from(this.packages.values());
  }

  /**
   * Generate help text for a package
   */
  generatePackageHelp(packageName: string): string {
    const module = this.packages.get(packageName);
    if (!module) {
      return `Package ${packageName} not found`;
    }

    const lines: string[] = [];
    lines.push(`${module.description}`);
    lines.push('');
    lines.push('Commands:');
    for (const command of module.commands) {
      lines.push(`  ${command.name.padEnd(20)} ${command.description}`);
      for (const example of command.examples ?? []) {
        lines.push(`    Example: ${example}`);
      }
    }

    return lines.join('\n');
  }

  /**
   * Validate command structure
   */
  validateCommand(command: CommandDefinition): void {
    if (!command.name.trim()) {
      throw new ValidationError('Command name must be a non-empty string', {
        command: command.name,
      });
    }

    if (!command.description.trim()) {
      throw new ValidationError('Command description must be a non-empty string', {
        command: command.name,
      });
    }
  }
}

/**
 * Global command registry instance
 */
export const commandRegistry = new CommandRegistry();
