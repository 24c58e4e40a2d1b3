// SPDX-License-Identifier: Apache-2.0

import {injectable} from 'tsyringe-neo';
import {type ClusterApi, type ClusterApiFactory} from '../connection/cluster-api.js';
import {type ClusterContext} from '../../../core/context/cluster-context.js';
import {K8ClientClusterApi} from './k8-client-cluster-api.js';

@injectable()
export class K8ClientClusterApiFactory implements ClusterApiFactory {
  public create(context: ClusterContext): ClusterApi {
    return new K8ClientClusterApi(context);
  }
}
