// SPDX-License-Identifier: Apache-2.0

import readline from 'node:readline';
import chalk from 'chalk';
import {container} from 'tsyringe-neo';
import {ResourceKind} from '../integration/kube/resources/resource-kind.js';
import {type OutputChunk} from '../integration/kube/connection/stream-handle.js';
import {type CommandDispatcher} from '../commands/command-dispatcher.js';
import {type CommandOutcome} from '../commands/command-outcome.js';
import {type OutputWriter} from '../commands/output-writer.js';
import {type NavigationState} from '../core/navigation/navigation-state.js';
import {type ClusterContexts} from '../core/context/cluster-contexts.js';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {type KubewalkLogger} from '../core/logging/kubewalk-logger.js';
import {renderPrompt} from './prompt.js';

export interface ReplOptions {
  readonly input?: NodeJS.ReadableStream;
  readonly output?: NodeJS.WritableStream;
  readonly errorOutput?: NodeJS.WritableStream;
  /** whether input is an interactive terminal; defaults to whether it is a TTY */
  readonly terminal?: boolean;
  readonly color?: boolean;
}

/** Verbs whose single argument names something that can be completed. */
const COMPLETED_ARGUMENTS: Readonly<Record<string, ResourceKind | 'context' | 'command'>> = {
  context: 'context',
  ctx: 'context',
  namespace: ResourceKind.NAMESPACE,
  ns: ResourceKind.NAMESPACE,
  pod: ResourceKind.POD,
  container: ResourceKind.CONTAINER,
  help: 'command',
};

/**
 * The interactive front end: reads one line at a time, hands it to the dispatcher and prints the outcome. An interrupt
 * (Ctrl-C) cancels the running command through the dispatcher; with nothing running it only re-prompts. While a command
 * takes input (`exec -i`) the lines typed go to it instead.
 */
export class Repl implements OutputWriter {
  private readonly logger: KubewalkLogger;
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private readonly errorOutput: NodeJS.WritableStream;
  private readonly terminal: boolean;
  private readonly color: boolean;

  public constructor(
    private readonly dispatcher: CommandDispatcher,
    private readonly navigation: NavigationState,
    private readonly contexts: ClusterContexts,
    options: ReplOptions = {},
  ) {
    this.logger = container.resolve(InjectTokens.KubewalkLogger);
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.errorOutput = options.errorOutput ?? process.stderr;
    this.terminal = options.terminal ?? process.stdin.isTTY === true;
    this.color = options.color ?? this.terminal;
  }

  public async run(): Promise<void> {
    const rl = readline.createInterface({
      input: this.input,
      output: this.output,
      terminal: this.terminal,
      completer: (line: string) => this.complete(line),
      historySize: 500,
    });

    const onInterrupt = (): void => {
      if (!this.dispatcher.interrupt() && !this.dispatcher.running) {
        this.output.write('\n');
        rl.prompt();
      }
    };
    rl.on('SIGINT', onInterrupt);
    if (!this.terminal) {
      process.on('SIGINT', onInterrupt);
    }

    try {
      rl.setPrompt(this.prompt());
      rl.prompt();
      for await (const line of this.commandLines(rl)) {
        const outcome = await this.execute(line);
        if (outcome.status === 'ok' && outcome.result.type === 'exit') {
          break;
        }
        rl.setPrompt(this.prompt());
        rl.prompt();
      }
    } finally {
      process.removeListener('SIGINT', onInterrupt);
      rl.close();
    }
    this.logger.debug('session ended');
  }

  /**
   * The lines to run as commands, one at a time. A line typed while the running command takes input is sent to it, and
   * so is the end of input.
   */
  private async *commandLines(rl: readline.Interface): AsyncGenerator<string, void, undefined> {
    const pending: string[] = [];
    let closed = false;
    let waiter: (() => void) | undefined;
    const wake = (): void => {
      const resolve = waiter;
      waiter = undefined;
      resolve?.();
    };

    rl.on('line', (line: string) => {
      if (this.dispatcher.running?.handle?.sendInput(`${line}\n`) !== true) {
        pending.push(line);
        wake();
      }
    });
    rl.on('close', () => {
      this.dispatcher.running?.handle?.endInput();
      closed = true;
      wake();
    });

    while (true) {
      const line = pending.shift();
      if (line !== undefined) {
        yield line;
        continue;
      }
      if (closed) {
        return;
      }
      await new Promise<void>(resolve => {
        waiter = resolve;
      });
    }
  }

  /** Runs one line and prints its outcome. */
  public async execute(line: string): Promise<CommandOutcome> {
    const outcome = await this.dispatcher.execute(line, this);
    this.print(outcome);
    return outcome;
  }

  public write(chunk: OutputChunk): void {
    (chunk.channel === 'stderr' ? this.errorOutput : this.output).write(chunk.text);
  }

  public prompt(): string {
    return renderPrompt(this.navigation.snapshot(), this.color);
  }

  /**
   * Completes the verb, or the name argument of a navigation command from the cached listings. Never waits on the
   * network.
   */
  public complete(line: string): [string[], string] {
    const words = line.trimStart().split(/\s+/);
    const partial = words.at(-1) ?? '';
    if (words.length <= 1) {
      return [this.dispatcher.registry.verbs().filter(verb => verb.startsWith(partial)), partial];
    }
    if (words.length > 2) {
      return [[], partial];
    }

    const target = COMPLETED_ARGUMENTS[words[0]];
    const path = this.navigation.snapshot();
    let candidates: string[] = [];
    if (target === 'context') {
      candidates = this.contexts.names();
    } else if (target === 'command') {
      candidates = this.dispatcher.registry.verbs();
    } else if (target !== undefined) {
      const parentPath = path.parentPathFor(target);
      const active = this.contexts.get(path.context);
      candidates = active && parentPath !== undefined ? active.cache.completions(target, parentPath) : [];
    }
    return [candidates.filter(candidate => candidate.startsWith(partial)), partial];
  }

  private print(outcome: CommandOutcome): void {
    const colors = this.color ? chalk : undefined;
    switch (outcome.status) {
      case 'ok': {
        if (outcome.result.type === 'lines') {
          for (const line of outcome.result.lines) {
            this.output.write(`${line}\n`);
          }
        }
        break;
      }
      case 'failed': {
        const message = `${outcome.kind}: ${outcome.message}`;
        this.errorOutput.write(`${colors ? colors.red(message) : message}\n`);
        break;
      }
      case 'cancelled': {
        this.errorOutput.write(`${colors ? colors.yellow('cancelled') : 'cancelled'}\n`);
        break;
      }
    }
  }
}
