// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {type KubewalkLogger} from './logging/kubewalk-logger.js';
import {ConfigurationError} from './errors/configuration-error.js';

@injectable()
export class ErrorHandler {
  private readonly logger: KubewalkLogger;

  public constructor(@inject(InjectTokens.KubewalkLogger) logger?: KubewalkLogger) {
    this.logger = patchInject(logger, InjectTokens.KubewalkLogger, this.constructor.name);
  }

  /**
   * Reports an error that ended the program. Configuration mistakes get a one line message, anything else the full
   * error report.
   */
  public handle(error: unknown): void {
    const configurationError = this.extractConfigurationError(error);
    if (configurationError) {
      this.logger.showUser(chalk.red(configurationError.message));
      this.logger.error(configurationError.message, error);
    } else {
      this.logger.showUserError(error);
    }
  }

  /**
   * Recursively checks if an error is or is caused by a ConfigurationError
   */
  private extractConfigurationError(error: unknown): ConfigurationError | undefined {
    if (error instanceof ConfigurationError) {
      return error;
    }
    if (error instanceof Error && error.cause !== undefined) {
      return this.extractConfigurationError(error.cause);
    }
    return undefined;
  }
}
