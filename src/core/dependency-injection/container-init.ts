// SPDX-License-Identifier: Apache-2.0

import {container, Lifecycle} from 'tsyringe-neo';
import * as constants from '../constants.js';
import {InjectTokens} from './inject-tokens.js';
import {type KubewalkLogger} from '../logging/kubewalk-logger.js';
import {KubewalkWinstonLogger} from '../logging/kubewalk-winston-logger.js';
import {ErrorHandler} from '../error-handler.js';
import {ShellConfigLoader} from '../config/shell-config-loader.js';
import {IdentityResolver} from '../../integration/kube/identity/identity-resolver.js';
import {K8ClientClusterApiFactory} from '../../integration/kube/k8-client/k8-client-cluster-api-factory.js';

/**
 * Container class to manage the dependency injection container
 */
export class Container {
  private static instance?: Container;
  private static isInitialized: boolean = false;

  private constructor() {}

  /**
   * Get the singleton instance of the container
   */
  public static getInstance(): Container {
    if (!Container.instance) {
      Container.instance = new Container();
    }

    return Container.instance;
  }

  /**
   * Initialize the container with the default dependencies
   * @param homeDirectory - the home directory to use, defaults to constants.KUBEWALK_HOME_DIR
   * @param logLevel - the log level to use
   * @param developmentMode - if true, show full stack traces in error messages
   * @param testLogger - a test logger to use, if provided
   */
  public init(
    homeDirectory: string = constants.KUBEWALK_HOME_DIR,
    logLevel: string = constants.DEFAULT_LOG_LEVEL,
    developmentMode: boolean = false,
    testLogger?: KubewalkLogger,
  ): void {
    if (Container.isInitialized) {
      container.resolve<KubewalkLogger>(InjectTokens.KubewalkLogger).debug('Container already initialized');
      return;
    }

    // KubewalkLogger
    container.register(InjectTokens.LogLevel, {useValue: logLevel});
    container.register(InjectTokens.DevelopmentMode, {useValue: developmentMode});
    container.register(InjectTokens.HomeDirectory, {useValue: homeDirectory});
    if (testLogger) {
      container.registerInstance(InjectTokens.KubewalkLogger, testLogger);
      container.resolve<KubewalkLogger>(InjectTokens.KubewalkLogger).debug('Using test logger');
    } else {
      container.register(
        InjectTokens.KubewalkLogger,
        {useClass: KubewalkWinstonLogger},
        {lifecycle: Lifecycle.Singleton},
      );
      container.resolve<KubewalkLogger>(InjectTokens.KubewalkLogger).debug('Using default logger');
    }

    container.register(InjectTokens.ErrorHandler, {useClass: ErrorHandler}, {lifecycle: Lifecycle.Singleton});
    container.register(
      InjectTokens.ShellConfigLoader,
      {useClass: ShellConfigLoader},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(InjectTokens.IdentityResolver, {useClass: IdentityResolver}, {lifecycle: Lifecycle.Singleton});
    container.register(
      InjectTokens.ClusterApiFactory,
      {useClass: K8ClientClusterApiFactory},
      {lifecycle: Lifecycle.Singleton},
    );

    Container.isInitialized = true;
  }

  /**
   * clears the container and initializes it again, useful for tests and for applying a log level read from the
   * configuration file
   */
  public reset(
    homeDirectory?: string,
    logLevel?: string,
    developmentMode?: boolean,
    testLogger?: KubewalkLogger,
  ): void {
    if (Container.isInitialized) {
      container.resolve<KubewalkLogger>(InjectTokens.KubewalkLogger).debug('Resetting container');
      container.reset();
      Container.isInitialized = false;
    }
    Container.getInstance().init(homeDirectory, logLevel, developmentMode, testLogger);
  }

  /**
   * only call dispose when you are about to system exit
   */
  public async dispose(): Promise<void> {
    await container.dispose();
  }
}
