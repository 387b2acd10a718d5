import { ConfigurationError } from '../errors.js';

const COMMAND_SUFFIX = 'Command';

/** Display name of a command id: `ImagePullCommand` -> `imagepull`. */
export function commandNameFromId(id: string): string {
  const base = id.endsWith(COMMAND_SUFFIX) ? id.slice(0, -COMMAND_SUFFIX.length) : id;
  if (base === '' || /\s/.test(base)) {
    throw new ConfigurationError(`'${id}' is not a valid command id.`);
  }
  return base.toLowerCase();
}
