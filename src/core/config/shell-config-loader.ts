// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import path from 'node:path';
import * as yaml from 'yaml';
import {plainToInstance} from 'class-transformer';
import {type ValidationError, validateSync} from 'class-validator';
import {inject, injectable} from 'tsyringe-neo';
import {ShellConfig} from './model/shell-config.js';
import {ContextSettings} from './model/context-settings.js';
import {type CredentialSettings} from './model/credential-settings.js';
import {KubeconfigContextSource} from './kubeconfig-context-source.js';
import {type ContextConfig, type ContextEntry, type ContextTunables} from '../context/context-config.js';
import {type CredentialSource} from '../../integration/kube/identity/credential-source.js';
import {ConfigurationError} from '../errors/configuration-error.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {type KubewalkLogger} from '../logging/kubewalk-logger.js';
import {Duration} from '../time/duration.js';
import {errorMessage} from '../helpers.js';
import * as constants from '../constants.js';

export interface ConfigLoadOptions {
  /** explicit configuration file; it must exist */
  readonly configFile?: string;
  /** explicit kubeconfig; it must exist */
  readonly kubeconfigFile?: string;
  readonly environment?: NodeJS.ProcessEnv;
}

export interface LoadedConfig {
  readonly tunables: ContextTunables;
  readonly logLevel?: string;
  readonly contexts: readonly ContextEntry[];
  /** the files the configuration was read from */
  readonly sources: readonly string[];
}

/** Environment variables that override settings of the configuration file. */
const ENVIRONMENT_OVERRIDES: Readonly<Record<string, keyof ShellConfig>> = {
  [`${constants.KUBEWALK_ENV_PREFIX}REFRESH_INTERVAL_SECONDS`]: 'refreshIntervalSeconds',
  [`${constants.KUBEWALK_ENV_PREFIX}STALE_AFTER_SECONDS`]: 'staleAfterSeconds',
  [`${constants.KUBEWALK_ENV_PREFIX}CANCEL_GRACE_SECONDS`]: 'cancelGraceSeconds',
  [`${constants.KUBEWALK_ENV_PREFIX}RETRY_ATTEMPTS`]: 'retryAttempts',
  [`${constants.KUBEWALK_ENV_PREFIX}RETRY_BACKOFF_MILLIS`]: 'retryBackoffMillis',
  [`${constants.KUBEWALK_ENV_PREFIX}LOG_LEVEL`]: 'logLevel',
};

/**
 * Loads the shell configuration from `config.yaml` under the home directory (or an explicit file), applies
 * `KUBEWALK_*` environment overrides, and collects contexts from the kubeconfig and the configuration file. Contexts
 * of the configuration file replace kubeconfig contexts of the same name.
 */
@injectable()
export class ShellConfigLoader {
  private readonly logger: KubewalkLogger;
  private readonly homeDirectory: string;

  public constructor(
    @inject(InjectTokens.KubewalkLogger) logger?: KubewalkLogger,
    @inject(InjectTokens.HomeDirectory) homeDirectory?: string,
  ) {
    this.logger = patchInject(logger, InjectTokens.KubewalkLogger, this.constructor.name);
    this.homeDirectory = patchInject(homeDirectory, InjectTokens.HomeDirectory, this.constructor.name);
  }

  /**
   * @throws ConfigurationError - unreadable or invalid global settings, or an explicit file that does not exist
   */
  public load(options: ConfigLoadOptions = {}): LoadedConfig {
    const environment = options.environment ?? process.env;
    const sources: string[] = [];

    const configFile = options.configFile ?? path.join(this.homeDirectory, constants.KUBEWALK_CONFIG_FILE);
    const raw = this.readYaml(configFile, options.configFile !== undefined);
    if (raw !== undefined) {
      sources.push(configFile);
    }

    const settings = ShellConfigLoader.parseSettings(raw ?? {}, environment, configFile);
    const contexts = new Map<string, ContextEntry>();

    const kubeconfigSource = new KubeconfigContextSource();
    const kubeconfig = kubeconfigSource.locate(options.kubeconfigFile, environment);
    if (kubeconfig) {
      sources.push(kubeconfig);
      for (const entry of kubeconfigSource.read(kubeconfig)) {
        contexts.set(entry.name, entry);
      }
    }

    const baseDirectory = path.dirname(configFile);
    for (const [index, rawContext] of settings.contexts.entries()) {
      const entry = this.contextEntry(rawContext, index, baseDirectory, environment, configFile);
      if (contexts.has(entry.name)) {
        this.logger.debug(`context '${entry.name}' of ${configFile} replaces the kubeconfig context`);
      }
      contexts.set(entry.name, entry);
    }

    const refreshInterval = Duration.ofSeconds(settings.refreshIntervalSeconds);
    return {
      tunables: {
        refreshInterval,
        staleAfter:
          settings.staleAfterSeconds === undefined
            ? refreshInterval.multipliedBy(2)
            : Duration.ofSeconds(settings.staleAfterSeconds),
        cancelGracePeriod: Duration.ofMillis(Math.round(settings.cancelGraceSeconds * 1000)),
        retryAttempts: settings.retryAttempts,
        retryBackoff: Duration.ofMillis(settings.retryBackoffMillis),
      },
      logLevel: settings.logLevel,
      contexts: [...contexts.values()],
      sources,
    };
  }

  private readYaml(file: string, required: boolean): unknown {
    if (!fs.existsSync(file)) {
      if (required) {
        throw new ConfigurationError(`configuration file '${file}' does not exist`);
      }
      this.logger.debug(`no configuration file at ${file}, using defaults`);
      return undefined;
    }

    try {
      return yaml.parse(fs.readFileSync(file, 'utf8')) ?? {};
    } catch (error) {
      throw new ConfigurationError(`cannot parse '${file}': ${errorMessage(error)}`, error, {file});
    }
  }

  private static parseSettings(raw: unknown, environment: NodeJS.ProcessEnv, file: string): ShellConfig {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      throw new ConfigurationError(`'${file}' must contain a mapping`);
    }

    const plain: Record<string, unknown> = {...raw};
    for (const [variable, field] of Object.entries(ENVIRONMENT_OVERRIDES)) {
      const value = environment[variable];
      if (value !== undefined && value !== '') {
        plain[field] = value;
      }
    }

    const settings = plainToInstance(ShellConfig, plain, {exposeDefaultValues: true});
    const errors = validateSync(settings);
    if (errors.length > 0) {
      throw new ConfigurationError(`invalid settings in '${file}': ${ShellConfigLoader.describe(errors)}`, {}, {file});
    }
    return settings;
  }

  private contextEntry(
    raw: unknown,
    index: number,
    baseDirectory: string,
    environment: NodeJS.ProcessEnv,
    file: string,
  ): ContextEntry {
    const fallbackName =
      typeof raw === 'object' && raw !== null && 'name' in raw && typeof raw.name === 'string' && raw.name
        ? raw.name
        : `contexts[${index}]`;

    try {
      if (typeof raw !== 'object' || raw === null) {
        throw new ConfigurationError(`context #${index + 1} in '${file}' is not a mapping`);
      }
      const settings = plainToInstance(ContextSettings, raw);
      const errors = validateSync(settings);
      if (errors.length > 0) {
        throw new ConfigurationError(`invalid context '${fallbackName}': ${ShellConfigLoader.describe(errors)}`);
      }
      return ShellConfigLoader.toContextConfig(settings, baseDirectory, environment, file);
    } catch (error) {
      const failure =
        error instanceof ConfigurationError
          ? error
          : new ConfigurationError(`context '${fallbackName}': ${errorMessage(error)}`, error);
      this.logger.warn(`context '${fallbackName}' not loaded: ${failure.message}`);
      return {name: fallbackName, error: failure, origin: file};
    }
  }

  private static toContextConfig(
    settings: ContextSettings,
    baseDirectory: string,
    environment: NodeJS.ProcessEnv,
    file: string,
  ): ContextConfig {
    const credentials = settings.credentials.map((credential, index) =>
      ShellConfigLoader.credentialSource(credential, index, settings.name, baseDirectory, environment),
    );

    const {trust} = settings;
    let caBundle: Buffer | string | undefined;
    if (trust?.caFile) {
      caBundle = fs.readFileSync(path.resolve(baseDirectory, trust.caFile));
    } else if (trust?.caData) {
      caBundle = trust.caData;
    }

    return {
      name: settings.name,
      server: settings.server,
      credentials,
      trust: trust ? {caBundle, insecureSkipVerify: trust.insecureSkipVerify} : undefined,
      origin: file,
    };
  }

  private static credentialSource(
    credential: CredentialSettings,
    index: number,
    context: string,
    baseDirectory: string,
    environment: NodeJS.ProcessEnv,
  ): CredentialSource {
    if ((credential.file === undefined) === (credential.data === undefined)) {
      throw new ConfigurationError(`credential #${index + 1} of context '${context}' needs exactly one of file or data`);
    }

    const passphrase =
      credential.passphrase ?? (credential.passphraseEnv ? environment[credential.passphraseEnv] : undefined);
    if (credential.file !== undefined) {
      const file = path.resolve(baseDirectory, credential.file);
      return {data: fs.readFileSync(file), encoding: credential.encoding, passphrase, label: credential.file};
    }
    return {
      data: credential.data ?? '',
      encoding: credential.encoding,
      passphrase,
      label: `credential #${index + 1} of '${context}'`,
    };
  }

  private static describe(errors: readonly ValidationError[], prefix: string = ''): string {
    return errors
      .flatMap(error => {
        const property = `${prefix}${error.property}`;
        const own = Object.values(error.constraints ?? {}).map(message => message.replace(error.property, property));
        const nested = error.children?.length ? [ShellConfigLoader.describe(error.children, `${property}.`)] : [];
        return [...own, ...nested];
      })
      .join('; ');
  }
}
