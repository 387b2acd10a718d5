/**
 * Help text for a command: path and description, usage line, sub-commands,
 * options, option requirements and usage hints.
 *
 * Both column layouts pad labels to `max(label length) + 4`.
 */

import { commandPath, commandPathNames } from '../../core/commands/registry.js';
import { longToken, shortToken } from '../../core/options/definitions.js';
import { describeRequirement } from '../../core/options/requirements.js';
import type { CommandNode, CommandRegistry } from '../../types/command.js';
import type { OptionDefinition } from '../../types/options.js';

const INDENT = '  ';
const COLUMN_GAP = 4;

/** Placeholder after the path in the usage line. */
function argsPlaceholder(command: CommandNode, hasSubCommands: boolean): string {
  if (hasSubCommands) return 'COMMAND';
  return command.argsHelp ?? '';
}

/** Usage segment of one path command, e.g. `image [IMAGE_OPTIONS]`. */
function usageSegment(command: CommandNode): string {
  if (!command.hasOptions) return command.name;
  const placeholder = `${command.name.toUpperCase()}_OPTIONS`;
  return command.hasRequiredOptions
    ? `${command.name} ${placeholder}`
    : `${command.name} [${placeholder}]`;
}

export function renderUsage(command: CommandNode, registry: CommandRegistry): string {
  const parts = commandPath(registry, command).map(usageSegment);
  const placeholder = argsPlaceholder(command, registry.childrenOf(command).length > 0);
  if (placeholder !== '') parts.push(placeholder);
  return parts.join(' ');
}

/** Option label without the alias column, e.g. `--tag string`. */
function optionLabel(option: OptionDefinition): string {
  return [longToken(option), ...option.args].join(' ');
}

function renderOptions(options: readonly OptionDefinition[]): string[] {
  const width = Math.max(...options.map((opt) => optionLabel(opt).length)) + COLUMN_GAP;
  return options.map((opt) => {
    const alias = shortToken(opt);
    const aliasColumn = alias === undefined ? '    ' : `${alias}, `;
    return `${INDENT}${aliasColumn}${optionLabel(opt).padEnd(width)}${opt.description}`;
  });
}

function renderCommands(children: readonly CommandNode[]): string[] {
  const width = Math.max(...children.map((c) => c.name.length)) + COLUMN_GAP;
  return children.map((c) => `${INDENT}${c.name.padEnd(width)}${c.description}`);
}

export function renderHelp(command: CommandNode, registry: CommandRegistry): string {
  const pathNames = commandPathNames(registry, command);
  const children = registry.childrenOf(command).map((d) => registry.resolve(d));
  const lines: string[] = [];

  lines.push(pathNames);
  lines.push(command.description);
  lines.push('');

  lines.push(`Usage:  ${renderUsage(command, registry)}`);
  lines.push('');

  if (children.length > 0) {
    lines.push('Commands:');
    lines.push(...renderCommands(children));
    lines.push('');
  }

  if (command.options.length > 0) {
    lines.push('Options:');
    lines.push(...renderOptions(command.options));
    lines.push('');
  }

  if (command.requirements.length > 0) {
    lines.push('Option requirements:');
    for (const rule of command.requirements) {
      lines.push(`${INDENT}${describeRequirement(command.options, rule)}`);
    }
    lines.push('');
  }

  lines.push(`Run '${pathNames} -h' or '${pathNames} --help' to print help.`);
  if (command.isRoot) {
    lines.push(`Run '${pathNames} COMMAND -h' or '${pathNames} COMMAND --help' for more information on a command.`);
  }
  lines.push('');

  return `${lines.join('\n')}\n`;
}
