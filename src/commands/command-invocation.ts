// SPDX-License-Identifier: Apache-2.0

import {v4 as uuid4} from 'uuid';
import {type NavigationPath} from '../core/navigation/navigation-path.js';
import {IllegalStateError} from '../core/errors/illegal-state-error.js';
import {type CommandDefinition} from './command-definition.js';

export type InvocationState = 'parsed' | 'resolved' | 'running' | 'completed' | 'failed' | 'cancelled';

const TRANSITIONS: Readonly<Record<InvocationState, readonly InvocationState[]>> = {
  parsed: ['resolved', 'failed'],
  resolved: ['running', 'failed'],
  running: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

export type OptionValue = string | number | boolean;

export interface ParsedArguments {
  readonly positionals: readonly string[];
  readonly options: ReadonlyMap<string, OptionValue>;
}

/**
 * One line the user entered, from tokenizing to its final state. The navigation path is the one in effect when the
 * line was read and does not follow later navigation.
 */
export class CommandInvocation {
  public readonly id: string = uuid4();
  private _state: InvocationState = 'parsed';
  private _definition?: CommandDefinition;
  private _arguments: ParsedArguments = {positionals: [], options: new Map()};

  public constructor(
    public readonly verb: string,
    public readonly words: readonly string[],
    public readonly path: NavigationPath,
  ) {}

  public get state(): InvocationState {
    return this._state;
  }

  public get definition(): CommandDefinition {
    if (!this._definition) {
      throw new IllegalStateError(`invocation of '${this.verb}' is not resolved`, this._state);
    }
    return this._definition;
  }

  public get positionals(): readonly string[] {
    return this._arguments.positionals;
  }

  public resolve(definition: CommandDefinition, parsed: ParsedArguments): void {
    this.transition('resolved');
    this._definition = definition;
    this._arguments = parsed;
  }

  public transition(next: InvocationState): void {
    if (!TRANSITIONS[this._state].includes(next)) {
      throw new IllegalStateError(`invocation of '${this.verb}' cannot go from ${this._state} to ${next}`, this._state);
    }
    this._state = next;
  }

  public flag(name: string): boolean {
    return this._arguments.options.get(name) === true;
  }

  public option(name: string): string | undefined {
    const value = this._arguments.options.get(name);
    return typeof value === 'string' ? value : undefined;
  }

  public numberOption(name: string): number | undefined {
    const value = this._arguments.options.get(name);
    return typeof value === 'number' ? value : undefined;
  }

  public toString(): string {
    return [this.verb, ...this.words].join(' ');
  }
}
