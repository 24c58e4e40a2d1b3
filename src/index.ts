// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import yargs from 'yargs';
import {hideBin} from 'yargs/helpers';
import 'dotenv/config';
import 'reflect-metadata';
import {container} from 'tsyringe-neo';

import * as constants from './core/constants.js';
import {Container} from './core/dependency-injection/container-init.js';
import {InjectTokens} from './core/dependency-injection/inject-tokens.js';
import {type KubewalkLogger} from './core/logging/kubewalk-logger.js';
import {KubewalkError} from './core/errors/kubewalk-error.js';
import {ConfigurationError} from './core/errors/configuration-error.js';
import {type ShellConfigLoader} from './core/config/shell-config-loader.js';
import {LOG_LEVELS} from './core/config/model/shell-config.js';
import {isLoadFailure} from './core/context/context-config.js';
import {ClusterContexts} from './core/context/cluster-contexts.js';
import {NavigationState} from './core/navigation/navigation-state.js';
import {type IdentityResolver} from './integration/kube/identity/identity-resolver.js';
import {type ClusterApiFactory} from './integration/kube/connection/cluster-api.js';
import {CommandDispatcher} from './commands/command-dispatcher.js';
import {defaultRegistry} from './commands/definitions/index.js';
import {Repl} from './repl/repl.js';
import {getKubewalkVersion} from '../version.js';

/** Quotes a word so that the command line tokenizer reads it back unchanged. */
function quoteWord(word: string): string {
  return `"${word.replace(/["\\]/g, String.raw`\$&`)}"`;
}

export async function main(argv: string[], context?: {logger?: KubewalkLogger}): Promise<void> {
  const argvParsed = await yargs(hideBin(argv))
    .scriptName('kubewalk')
    .usage('Usage:\n  kubewalk [options]')
    .option('config', {type: 'string', description: `configuration file (default: ~/.kubewalk/${constants.KUBEWALK_CONFIG_FILE})`})
    .option('kubeconfig', {type: 'string', description: 'kubeconfig to read contexts from (default: $KUBECONFIG)'})
    .option('context', {type: 'string', description: 'context to switch to on start'})
    .option('log-level', {type: 'string', choices: LOG_LEVELS, description: 'log level of the log file'})
    .option('dev', {type: 'boolean', default: false, description: 'show stack traces of errors'})
    .alias('h', 'help')
    .alias('v', 'version')
    .version(getKubewalkVersion())
    .strict()
    .parseAsync();

  try {
    Container.getInstance().init(
      constants.KUBEWALK_HOME_DIR,
      argvParsed.logLevel ?? constants.DEFAULT_LOG_LEVEL,
      argvParsed.dev,
    );
  } catch (error) {
    throw new KubewalkError('Error initializing container', error);
  }

  let logger = container.resolve<KubewalkLogger>(InjectTokens.KubewalkLogger);
  const configLoader = container.resolve<ShellConfigLoader>(InjectTokens.ShellConfigLoader);
  const loaded = configLoader.load({configFile: argvParsed.config, kubeconfigFile: argvParsed.kubeconfig});
  if (argvParsed.logLevel === undefined && loaded.logLevel !== undefined && loaded.logLevel !== constants.DEFAULT_LOG_LEVEL) {
    Container.getInstance().reset(constants.KUBEWALK_HOME_DIR, loaded.logLevel, argvParsed.dev);
    logger = container.resolve<KubewalkLogger>(InjectTokens.KubewalkLogger);
  }

  if (context) {
    // save the logger so that kubewalk.ts can use it to properly flush the logs and exit
    context.logger = logger;
  }
  process.on('unhandledRejection', (reason: unknown) => {
    logger.showUserError(new KubewalkError(`Unhandled Rejection, reason: ${String(reason)}`, reason));
  });
  process.on('uncaughtException', (error: Error, origin: string) => {
    logger.showUserError(new KubewalkError(`Uncaught Exception: ${error}, origin: ${origin}`, error));
  });

  logger.debug(`kubewalk ${getKubewalkVersion()} started`, {sources: loaded.sources});
  if (loaded.contexts.length === 0) {
    throw new ConfigurationError(
      `no contexts configured: add contexts to ~/.kubewalk/${constants.KUBEWALK_CONFIG_FILE} or point --kubeconfig at a kubeconfig`,
    );
  }
  for (const entry of loaded.contexts) {
    if (isLoadFailure(entry)) {
      logger.showUser(chalk.yellow(`context '${entry.name}' is unusable: ${entry.error.message}`));
    }
  }

  const contexts = new ClusterContexts(
    loaded.contexts,
    loaded.tunables,
    container.resolve<IdentityResolver>(InjectTokens.IdentityResolver),
    container.resolve<ClusterApiFactory>(InjectTokens.ClusterApiFactory),
  );
  const navigation = new NavigationState(contexts);
  const dispatcher = new CommandDispatcher(defaultRegistry(), navigation, contexts);
  const repl = new Repl(dispatcher, navigation, contexts);

  try {
    if (argvParsed.context !== undefined) {
      await repl.execute(`context ${quoteWord(argvParsed.context)}`);
    }
    await repl.run();
  } finally {
    await contexts.close();
  }
}
