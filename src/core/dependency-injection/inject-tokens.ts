// SPDX-License-Identifier: Apache-2.0

/**
 * Dependency injection tokens
 */
export const InjectTokens = {
  LogLevel: Symbol.for('LogLevel'),
  DevelopmentMode: Symbol.for('DevelopmentMode'),
  HomeDirectory: Symbol.for('HomeDirectory'),
  KubewalkLogger: Symbol.for('KubewalkLogger'),
  ErrorHandler: Symbol.for('ErrorHandler'),
  ShellConfigLoader: Symbol.for('ShellConfigLoader'),
  IdentityResolver: Symbol.for('IdentityResolver'),
  ClusterApiFactory: Symbol.for('ClusterApiFactory'),
};
