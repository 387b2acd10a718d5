/**
 * Command declaration.
 *
 * defineCommand() checks a command's options and requirement rules up front,
 * so a tree that loads is a tree whose rules all reference declared options.
 */

import { ConfigurationError } from '../errors.js';
import { assertValidDefinitions } from '../options/definitions.js';
import { assertRequirements } from '../options/requirements.js';
import { commandNameFromId } from './naming.js';
import type { CommandNode, CommandSpec } from '../../types/command.js';

export function defineCommand(spec: CommandSpec): CommandNode {
  const name = commandNameFromId(spec.id);
  const options = Object.freeze([...(spec.options ?? [])]);
  const requirements = Object.freeze([...(spec.requirements ?? [])]);

  if (spec.description.trim() === '') {
    throw new ConfigurationError(`Command ${spec.id} needs a description.`);
  }
  if (spec.optionsRequired === true && options.length === 0) {
    throw new ConfigurationError(`Command ${spec.id} marks its options as required but declares none.`);
  }
  assertValidDefinitions(options);
  assertRequirements(options, requirements);

  return Object.freeze({
    id: spec.id,
    name,
    description: spec.description,
    options,
    requirements,
    hasOptions: options.length > 0,
    hasRequiredOptions: options.length > 0 && spec.optionsRequired === true,
    printHelpWithNoArgs: spec.printHelpWithNoArgs ?? true,
    isRoot: spec.isRoot ?? false,
    ...(spec.argsHelp !== undefined && { argsHelp: spec.argsHelp }),
    ...(spec.execute !== undefined && { execute: spec.execute }),
  });
}
