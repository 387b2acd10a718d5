/**
 * Statically populated command registry.
 *
 * Commands are registered explicitly at startup as descriptors
 * `{ id, namespace, create }`. The tree shape comes from namespaces: the
 * children of a command with namespace `app` and name `image` are the
 * descriptors registered under `app.image`. Instances are created lazily on
 * first resolve and cached, so a large tree is never built eagerly.
 */

import { ConfigurationError } from '../errors.js';
import { commandNameFromId } from './naming.js';
import type { CommandDescriptor, CommandNode, CommandRegistry } from '../../types/command.js';

const NAMESPACE = /^[A-Za-z0-9_-]+(\.[A-Za-z0-9_-]+)*$/;

function byId(a: CommandDescriptor, b: CommandDescriptor): number {
  if (a.id < b.id) return -1;
  if (a.id > b.id) return 1;
  return 0;
}

function splitNamespace(namespace: string): { parent: string; owner: string } | undefined {
  const lastDot = namespace.lastIndexOf('.');
  if (lastDot < 0) return undefined;
  return { parent: namespace.slice(0, lastDot), owner: namespace.slice(lastDot + 1) };
}

export class StaticCommandRegistry implements CommandRegistry {
  private readonly descriptors = new Map<string, CommandDescriptor>();
  private readonly instances = new Map<string, CommandNode>();

  constructor(descriptors: readonly CommandDescriptor[] = []) {
    for (const descriptor of descriptors) this.register(descriptor);
  }

  register(descriptor: CommandDescriptor): this {
    if (this.descriptors.has(descriptor.id)) {
      throw new ConfigurationError(`Command ${descriptor.id} is registered more than once.`);
    }
    if (!NAMESPACE.test(descriptor.namespace)) {
      throw new ConfigurationError(`Command ${descriptor.id} has an invalid namespace '${descriptor.namespace}'.`);
    }
    const name = commandNameFromId(descriptor.id);
    for (const other of this.descriptors.values()) {
      if (other.namespace === descriptor.namespace && commandNameFromId(other.id) === name) {
        throw new ConfigurationError(
          `Commands ${other.id} and ${descriptor.id} share the name '${name}' in ${descriptor.namespace}.`,
        );
      }
    }
    this.descriptors.set(descriptor.id, descriptor);
    return this;
  }

  /** Descriptor registered under `id`. */
  descriptor(id: string): CommandDescriptor {
    const found = this.descriptors.get(id);
    if (!found) throw new ConfigurationError(`Command ${id} is not registered.`);
    return found;
  }

  /** Resolve the command registered under `id`. */
  get(id: string): CommandNode {
    return this.resolve(this.descriptor(id));
  }

  resolve(descriptor: CommandDescriptor): CommandNode {
    const cached = this.instances.get(descriptor.id);
    if (cached) return cached;

    const command = descriptor.create();
    if (command.id !== descriptor.id) {
      throw new ConfigurationError(`Descriptor ${descriptor.id} created a command with id ${command.id}.`);
    }
    this.instances.set(descriptor.id, command);
    return command;
  }

  childrenOf(command: CommandNode): readonly CommandDescriptor[] {
    const childNamespace = `${this.descriptor(command.id).namespace}.${command.name}`;
    return [...this.descriptors.values()]
      .filter((d) => d.namespace === childNamespace)
      .sort(byId);
  }

  parentOf(command: CommandNode): CommandDescriptor | undefined {
    return this.parentOfDescriptor(this.descriptor(command.id));
  }

  /** Commands from the root down to `command`. */
  pathOf(command: CommandNode): CommandNode[] {
    return commandPath(this, command);
  }

  /** The single command without a parent. */
  root(): CommandNode {
    const roots = [...this.descriptors.values()]
      .filter((d) => this.parentOfDescriptor(d) === undefined)
      .sort(byId);
    const [first, ...rest] = roots;
    if (!first) throw new ConfigurationError('No root command is registered.');
    if (rest.length > 0) {
      throw new ConfigurationError(`Several root commands are registered: ${roots.map((d) => d.id).join(', ')}.`);
    }
    return this.resolve(first);
  }

  private parentOfDescriptor(descriptor: CommandDescriptor): CommandDescriptor | undefined {
    const level = splitNamespace(descriptor.namespace);
    if (!level) return undefined;
    return [...this.descriptors.values()].find((d) =>
      d.namespace === level.parent && commandNameFromId(d.id) === level.owner);
  }
}

/**
 * Commands from the root down to `command`. Recomputed on every call by
 * walking the parent relation one namespace level at a time.
 */
export function commandPath(registry: CommandRegistry, command: CommandNode): CommandNode[] {
  const path: CommandNode[] = [command];
  let parent = registry.parentOf(command);
  while (parent) {
    const node = registry.resolve(parent);
    path.unshift(node);
    parent = registry.parentOf(node);
  }
  return path;
}

/** Space-separated display names from the root down to `command`. */
export function commandPathNames(registry: CommandRegistry, command: CommandNode): string {
  return commandPath(registry, command).map((c) => c.name).join(' ');
}
