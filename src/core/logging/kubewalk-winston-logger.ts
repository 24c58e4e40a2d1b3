// SPDX-License-Identifier: Apache-2.0

import * as winston from 'winston';
import {v4 as uuidv4} from 'uuid';
import * as util from 'node:util';
import path from 'node:path';
import chalk from 'chalk';
import * as constants from '../constants.js';
import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type KubewalkLogger} from './kubewalk-logger.js';

const customFormat = winston.format.combine(
  winston.format.label({label: 'KUBEWALK', message: false}),

  winston.format.splat(),

  // include timestamp in logs
  winston.format.timestamp(),

  winston.format.ms(),

  // convert levels to upper case
  winston.format(data => {
    data.level = data.level.toUpperCase();
    return data;
  })(),

  // use custom format TIMESTAMP|LEVEL| MESSAGE
  winston.format.printf(data => `${data.timestamp}|${data.level}| ${data.message}`),

  // Ignore log messages if they have { private: true }
  winston.format(data => (data.private ? false : data))(),
);

interface StackEntry {
  message: string;
  stacktrace: string;
}

@injectable()
export class KubewalkWinstonLogger implements KubewalkLogger {
  private readonly winstonLogger: winston.Logger;
  private traceId?: string;
  private readonly developmentMode: boolean;

  /**
   * @param logLevel - the log level to use
   * @param developmentMode - if true, show full stack traces in error messages
   * @param homeDirectory - logs are written below `<homeDirectory>/logs`
   */
  public constructor(
    @inject(InjectTokens.LogLevel) logLevel?: string,
    @inject(InjectTokens.DevelopmentMode) developmentMode?: boolean,
    @inject(InjectTokens.HomeDirectory) homeDirectory?: string,
  ) {
    logLevel = patchInject(logLevel, InjectTokens.LogLevel, this.constructor.name);
    this.developmentMode = patchInject(developmentMode, InjectTokens.DevelopmentMode, this.constructor.name);
    homeDirectory = patchInject(homeDirectory, InjectTokens.HomeDirectory, this.constructor.name);

    this.nextTraceId();

    this.winstonLogger = winston.createLogger({
      level: logLevel,
      format: winston.format.combine(customFormat, winston.format.json()),
      transports: [
        new winston.transports.File({filename: path.join(homeDirectory, 'logs', constants.KUBEWALK_LOG_FILE)}),
      ],
    });
  }

  public nextTraceId() {
    this.traceId = uuidv4();
  }

  public prepMeta(meta: Record<string, unknown> = {}): Record<string, unknown> {
    meta.traceId = this.traceId;
    return meta;
  }

  public showUser(message: unknown, ...arguments_: unknown[]) {
    console.log(util.format(message, ...arguments_));
    this.info(util.format(message, ...arguments_));
  }

  public showUserError(error: unknown) {
    const stack: StackEntry[] = [KubewalkWinstonLogger.stackEntry(error)];
    let depth = 0;
    let cause = KubewalkWinstonLogger.causeOf(error);
    while (cause !== undefined && depth < 10) {
      if (cause instanceof Error && cause.stack) {
        stack.push(KubewalkWinstonLogger.stackEntry(cause));
      }
      cause = KubewalkWinstonLogger.causeOf(cause);
      depth += 1;
    }

    console.log(chalk.red('*********************************** ERROR *****************************************'));
    if (this.developmentMode) {
      let prefix = '';
      let indent = '';
      for (const s of stack) {
        console.log(indent + prefix + chalk.yellow(s.message));
        // Remove everything after the first "Caused by: " and add indentation
        const formattedStacktrace = s.stacktrace
          .replace(/Caused by:.*/s, '')
          .replace(/\n\s*/g, '\n' + indent)
          .trim();
        console.log(indent + chalk.gray(formattedStacktrace) + '\n');
        indent += '  ';
        prefix = 'Caused by: ';
      }
    } else {
      for (const line of stack[0].message.split('\n')) {
        console.log(chalk.yellow(line));
      }
    }
    console.log(chalk.red('***********************************************************************************'));

    this.error(stack[0].message, error);
  }

  public error(message: unknown, ...arguments_: unknown[]) {
    this.winstonLogger.error(String(message), ...arguments_, this.prepMeta());
  }

  public warn(message: unknown, ...arguments_: unknown[]) {
    this.winstonLogger.warn(String(message), ...arguments_, this.prepMeta());
  }

  public info(message: unknown, ...arguments_: unknown[]) {
    this.winstonLogger.info(String(message), ...arguments_, this.prepMeta());
  }

  public debug(message: unknown, ...arguments_: unknown[]) {
    this.winstonLogger.debug(String(message), ...arguments_, this.prepMeta());
  }

  private static stackEntry(error: unknown): StackEntry {
    if (error instanceof Error) {
      return {message: error.message, stacktrace: error.stack ?? ''};
    }
    return {message: String(error), stacktrace: ''};
  }

  private static causeOf(error: unknown): unknown {
    return error instanceof Error ? error.cause : undefined;
  }
}
