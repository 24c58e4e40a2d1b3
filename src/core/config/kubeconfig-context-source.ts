// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {type Context, KubeConfig} from '@kubernetes/client-node';
import {container} from 'tsyringe-neo';
import {type ContextConfig, type ContextEntry} from '../context/context-config.js';
import {type CredentialSource} from '../../integration/kube/identity/credential-source.js';
import {ConfigurationError} from '../errors/configuration-error.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type KubewalkLogger} from '../logging/kubewalk-logger.js';
import {errorMessage} from '../helpers.js';

/**
 * Reads cluster contexts from a kubeconfig file. Only client certificate authentication is mapped; contexts using
 * tokens or exec plugins come out without credentials and fail when activated.
 */
export class KubeconfigContextSource {
  private readonly logger: KubewalkLogger;

  public constructor() {
    this.logger = container.resolve(InjectTokens.KubewalkLogger);
  }

  /**
   * The kubeconfig to read: the explicit path, else the first existing entry of `$KUBECONFIG`, else `~/.kube/config`
   * when it exists.
   *
   * @throws ConfigurationError - an explicit path that does not exist
   */
  public locate(explicit?: string, environment: NodeJS.ProcessEnv = process.env): string | undefined {
    if (explicit) {
      if (!fs.existsSync(explicit)) {
        throw new ConfigurationError(`kubeconfig '${explicit}' does not exist`);
      }
      return explicit;
    }

    const fromEnvironment = (environment.KUBECONFIG ?? '')
      .split(path.delimiter)
      .find(candidate => candidate && fs.existsSync(candidate));
    if (fromEnvironment) {
      return fromEnvironment;
    }

    const fallback = path.join(os.homedir(), '.kube', 'config');
    return fs.existsSync(fallback) ? fallback : undefined;
  }

  /**
   * @throws ConfigurationError - the file cannot be parsed at all
   */
  public read(file: string): ContextEntry[] {
    const kubeConfig = new KubeConfig();
    try {
      kubeConfig.loadFromFile(file);
    } catch (error) {
      throw new ConfigurationError(`cannot read kubeconfig '${file}': ${errorMessage(error)}`, error, {file});
    }

    return kubeConfig.getContexts().map((context): ContextEntry => {
      try {
        return this.toContextConfig(kubeConfig, context, file);
      } catch (error) {
        const failure =
          error instanceof ConfigurationError
            ? error
            : new ConfigurationError(`context '${context.name}' in '${file}': ${errorMessage(error)}`, error);
        this.logger.debug(`skipping kubeconfig context '${context.name}': ${failure.message}`);
        return {name: context.name, error: failure, origin: file};
      }
    });
  }

  private toContextConfig(kubeConfig: KubeConfig, context: Context, file: string): ContextConfig {
    const directory = path.dirname(file);
    const cluster = kubeConfig.getCluster(context.cluster);
    if (!cluster) {
      throw new ConfigurationError(`context '${context.name}' refers to unknown cluster '${context.cluster}'`);
    }
    const user = kubeConfig.getUser(context.user);
    if (!user) {
      throw new ConfigurationError(`context '${context.name}' refers to unknown user '${context.user}'`);
    }

    const credentials: CredentialSource[] = [];
    const certificate = KubeconfigContextSource.material(user.certData, user.certFile, directory);
    if (certificate) {
      credentials.push({data: certificate, label: `client certificate of '${context.name}'`});
    }
    const key = KubeconfigContextSource.material(user.keyData, user.keyFile, directory);
    if (key) {
      credentials.push({data: key, label: `client key of '${context.name}'`});
    }
    if (credentials.length === 0) {
      this.logger.debug(`kubeconfig context '${context.name}' has no client certificate`);
    }

    return {
      name: context.name,
      server: cluster.server,
      credentials,
      trust: {
        caBundle: KubeconfigContextSource.material(cluster.caData, cluster.caFile, directory),
        insecureSkipVerify: cluster.skipTLSVerify === true,
      },
      origin: file,
    };
  }

  private static material(data: string | undefined, file: string | undefined, directory: string): Buffer | undefined {
    if (data) {
      return Buffer.from(data, 'base64');
    }
    if (file) {
      return fs.readFileSync(path.resolve(directory, file));
    }
    return undefined;
  }
}
