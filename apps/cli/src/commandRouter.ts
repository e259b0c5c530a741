import type { CommandDescriptor, CommandRegistry } from './types.js';

export class CommandRouter implements CommandRegistry {
  private readonly descriptors = new Map<string, CommandDescriptor>();

  register(descriptor: CommandDescriptor): void {
    if (this.descriptors.has(descriptor.name)) {
      throw new Error(`Command '${descriptor.name}' is already registered`);
    }
    this.descriptors.set(descriptor.name, descriptor);
  }

  find(name: string): CommandDescriptor | undefined {
    return this.descriptors.get(name);
  }

  list(): CommandDescriptor[] {
    return [...this.descriptors.values()].sort((a, b) => a.name.localeCompare(b.name));
  }
}
