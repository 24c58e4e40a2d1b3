// SPDX-License-Identifier: Apache-2.0

import {KubewalkError} from '../core/errors/kubewalk-error.js';
import {
  CancelledError,
  InvalidArgumentError,
  NavigationError,
  NoSelectionError,
  UnknownCommandError,
} from '../core/errors/command-errors.js';
import {CredentialError} from '../core/errors/credential-errors.js';
import {ConnectionError, RequestFailedError} from '../core/errors/connection-errors.js';
import {NotFoundError} from '../core/errors/not-found-error.js';
import {IllegalArgumentError} from '../core/errors/illegal-argument-error.js';
import {MissingArgumentError} from '../core/errors/missing-argument-error.js';
import {ConfigurationError} from '../core/errors/configuration-error.js';
import {errorMessage} from '../core/helpers.js';

export enum ErrorKind {
  UNKNOWN_COMMAND = 'UnknownCommand',
  INVALID_ARGUMENT = 'InvalidArgument',
  NO_SELECTION = 'NoSelection',
  NOT_FOUND = 'NotFound',
  NOT_SELECTABLE = 'NotSelectable',
  AT_ROOT = 'AtRoot',
  UNKNOWN_CONTEXT = 'UnknownContext',
  CREDENTIAL = 'CredentialError',
  CONFIGURATION = 'ConfigurationError',
  CONNECTION = 'ConnectionError',
  REQUEST_FAILED = 'RequestFailed',
  INTERNAL = 'Internal',
}

export type OutcomePayload =
  | {readonly type: 'lines'; readonly lines: readonly string[]}
  | {readonly type: 'stream'; readonly chunks: number}
  | {readonly type: 'exit'};

export type CommandOutcome =
  | {readonly status: 'ok'; readonly result: OutcomePayload}
  | {readonly status: 'failed'; readonly kind: ErrorKind; readonly message: string; readonly error?: unknown}
  | {readonly status: 'cancelled'};

export const CommandOutcome = {
  ok(result: OutcomePayload): CommandOutcome {
    return {status: 'ok', result};
  },

  lines(lines: readonly string[] = []): CommandOutcome {
    return {status: 'ok', result: {type: 'lines', lines}};
  },

  failed(kind: ErrorKind, message: string, error?: unknown): CommandOutcome {
    return {status: 'failed', kind, message, error};
  },

  cancelled(): CommandOutcome {
    return {status: 'cancelled'};
  },

  fromError(error: unknown): CommandOutcome {
    if (error instanceof CancelledError) {
      return CommandOutcome.cancelled();
    }
    return CommandOutcome.failed(errorKindOf(error), errorMessage(error), error);
  },
};

const NAVIGATION_ERROR_KINDS: Readonly<Record<NavigationError['failure'], ErrorKind>> = {
  'not-selectable': ErrorKind.NOT_SELECTABLE,
  'at-root': ErrorKind.AT_ROOT,
  'unknown-context': ErrorKind.UNKNOWN_CONTEXT,
};

export function errorKindOf(error: unknown): ErrorKind {
  if (error instanceof UnknownCommandError) {
    return ErrorKind.UNKNOWN_COMMAND;
  }
  if (
    error instanceof InvalidArgumentError ||
    error instanceof IllegalArgumentError ||
    error instanceof MissingArgumentError ||
    error instanceof SyntaxError
  ) {
    return ErrorKind.INVALID_ARGUMENT;
  }
  if (error instanceof NoSelectionError) {
    return ErrorKind.NO_SELECTION;
  }
  if (error instanceof NotFoundError) {
    return ErrorKind.NOT_FOUND;
  }
  if (error instanceof NavigationError) {
    return NAVIGATION_ERROR_KINDS[error.failure];
  }
  if (error instanceof CredentialError) {
    return ErrorKind.CREDENTIAL;
  }
  if (error instanceof ConfigurationError) {
    return ErrorKind.CONFIGURATION;
  }
  if (error instanceof ConnectionError) {
    return ErrorKind.CONNECTION;
  }
  if (error instanceof RequestFailedError) {
    return ErrorKind.REQUEST_FAILED;
  }
  if (error instanceof KubewalkError && error.statusCode !== undefined) {
    return ErrorKind.REQUEST_FAILED;
  }
  return ErrorKind.INTERNAL;
}
