// SPDX-License-Identifier: Apache-2.0

import {container} from 'tsyringe-neo';
import {type NavigationState} from '../core/navigation/navigation-state.js';
import {type NavigationPath} from '../core/navigation/navigation-path.js';
import {type ClusterContexts} from '../core/context/cluster-contexts.js';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {type KubewalkLogger} from '../core/logging/kubewalk-logger.js';
import {NoSelectionError, UnknownCommandError} from '../core/errors/command-errors.js';
import {splitWords} from '../core/helpers.js';
import {CancellationToken} from './cancellation-token.js';
import {type CommandDefinition, type CommandEnvironment} from './command-definition.js';
import {CommandInvocation} from './command-invocation.js';
import {CommandOutcome} from './command-outcome.js';
import {parseArguments} from './command-parser.js';
import {type CommandRegistry} from './command-registry.js';
import {RunningTask} from './running-task.js';
import {DISCARDING_WRITER, type OutputWriter} from './output-writer.js';

/**
 * Turns input lines into outcomes: tokenize, look up the command, check the selection it needs, run it. Errors never
 * escape {@link execute}; they become failed outcomes.
 */
export class CommandDispatcher {
  private readonly logger: KubewalkLogger;
  private runningTask?: RunningTask;
  private lastInvocation?: CommandInvocation;

  public constructor(
    public readonly registry: CommandRegistry,
    private readonly navigation: NavigationState,
    private readonly contexts: ClusterContexts,
  ) {
    this.logger = container.resolve(InjectTokens.KubewalkLogger);
  }

  public get running(): RunningTask | undefined {
    return this.runningTask;
  }

  public get last(): CommandInvocation | undefined {
    return this.lastInvocation;
  }

  public async execute(line: string, writer: OutputWriter = DISCARDING_WRITER): Promise<CommandOutcome> {
    let words: string[];
    try {
      words = splitWords(line);
    } catch (error) {
      return CommandOutcome.fromError(error);
    }
    if (words.length === 0) {
      return CommandOutcome.lines();
    }

    this.logger.nextTraceId();
    const [verb, ...rest] = words;
    const invocation = new CommandInvocation(verb, rest, this.navigation.snapshot());
    this.lastInvocation = invocation;
    this.logger.debug(`execute [${invocation.id}]: ${invocation}`);

    let definition: CommandDefinition;
    try {
      definition = this.resolve(invocation);
    } catch (error) {
      invocation.transition('failed');
      return CommandOutcome.fromError(error);
    }

    const token = new CancellationToken();
    const task = new RunningTask(invocation, token, definition.interruptible ?? true);
    const environment: CommandEnvironment = {
      navigation: this.navigation,
      contexts: this.contexts,
      registry: this.registry,
      token,
      logger: this.logger,
    };

    this.runningTask = task;
    try {
      const outcome = await task.run(() => definition.run(invocation, environment), writer);
      if (outcome.status === 'failed') {
        this.logger.debug(`[${invocation.id}] ${outcome.kind}: ${outcome.message}`, outcome.error);
      }
      return outcome;
    } finally {
      this.runningTask = undefined;
    }
  }

  /**
   * Cancels the running command, if there is one and it has not been cancelled yet.
   *
   * @returns whether this call cancelled something
   */
  public interrupt(): boolean {
    const task = this.runningTask;
    if (!task) {
      return false;
    }
    const cancelled = task.cancel();
    if (cancelled) {
      this.logger.debug(`interrupt: cancelling task ${task.id} (${task.invocation.verb})`);
    }
    return cancelled;
  }

  private resolve(invocation: CommandInvocation): CommandDefinition {
    const definition = this.registry.find(invocation.verb);
    if (!definition) {
      throw new UnknownCommandError(invocation.verb);
    }
    const parsed = parseArguments(definition, invocation.words);
    this.checkSelection(definition, invocation.path);
    invocation.resolve(definition, parsed);
    return definition;
  }

  private checkSelection(definition: CommandDefinition, path: NavigationPath): void {
    const {requires} = definition;
    if (!requires) {
      return;
    }
    if (!this.contexts.get(path.context)) {
      throw new NoSelectionError(definition.name, 'context');
    }
    if ((requires === 'namespace' || requires === 'pod') && !path.namespace) {
      throw new NoSelectionError(definition.name, 'namespace');
    }
    if (requires === 'pod' && !path.pod) {
      throw new NoSelectionError(definition.name, 'pod');
    }
  }
}
