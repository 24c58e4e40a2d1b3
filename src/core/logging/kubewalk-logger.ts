// SPDX-License-Identifier: Apache-2.0

export interface KubewalkLogger {
  nextTraceId(): void;

  prepMeta(meta?: Record<string, unknown>): Record<string, unknown>;

  showUser(message: unknown, ...arguments_: unknown[]): void;

  showUserError(error: unknown): void;

  error(message: unknown, ...arguments_: unknown[]): void;

  warn(message: unknown, ...arguments_: unknown[]): void;

  info(message: unknown, ...arguments_: unknown[]): void;

  debug(message: unknown, ...arguments_: unknown[]): void;
}
