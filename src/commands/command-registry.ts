// SPDX-License-Identifier: Apache-2.0

import {IllegalArgumentError} from '../core/errors/illegal-argument-error.js';
import {type CommandDefinition} from './command-definition.js';

export class CommandRegistry {
  private readonly definitions: CommandDefinition[] = [];
  private readonly byVerb = new Map<string, CommandDefinition>();

  public constructor(definitions: readonly CommandDefinition[]) {
    for (const definition of definitions) {
      this.register(definition);
    }
  }

  public register(definition: CommandDefinition): void {
    for (const verb of [definition.name, ...(definition.aliases ?? [])]) {
      if (this.byVerb.has(verb)) {
        throw new IllegalArgumentError(`command '${verb}' is registered twice`, verb);
      }
      this.byVerb.set(verb, definition);
    }
    this.definitions.push(definition);
  }

  public find(verb: string): CommandDefinition | undefined {
    return this.byVerb.get(verb.toLowerCase());
  }

  public list(): readonly CommandDefinition[] {
    return this.definitions;
  }

  public verbs(): string[] {
    return [...this.byVerb.keys()].sort();
  }
}
