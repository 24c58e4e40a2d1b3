// SPDX-License-Identifier: Apache-2.0

import type http from 'node:http';
import {HttpError} from '@kubernetes/client-node';
import {StatusCodes} from 'http-status-codes';
import {type ResourceOperation, parentPathOf} from './resources/resource-kind.js';
import {type ResourcePath} from './connection/cluster-api.js';
import {NotFoundError} from '../../core/errors/not-found-error.js';
import {RequestFailedError} from '../../core/errors/connection-errors.js';
import {KubewalkError} from '../../core/errors/kubewalk-error.js';

export class KubeApiResponse {
  private constructor() {}

  /**
   * Checks the response for an error status code and throws an error if one is found.
   *
   * @param response - the HTTP response to be verified.
   * @param operation - the operation being performed on the resource.
   * @param path - the resource or listing the request addressed.
   */
  public static check(response: http.IncomingMessage, operation: ResourceOperation, path: ResourcePath): void {
    if (KubeApiResponse.isNotFound(response.statusCode)) {
      throw KubeApiResponse.notFound(path);
    }

    if (KubeApiResponse.isFailingStatus(response.statusCode)) {
      throw new RequestFailedError(
        KubeApiResponse.describe(operation, path),
        response.statusCode ?? StatusCodes.INTERNAL_SERVER_ERROR,
      );
    }
  }

  /**
   * Maps a rejection of the client library into the error taxonomy. Errors without an HTTP status (network failures)
   * are returned unchanged so that the connection can classify them.
   */
  public static translate(error: unknown, operation: ResourceOperation, path: ResourcePath): unknown {
    if (error instanceof KubewalkError) {
      return error;
    }
    if (error instanceof HttpError) {
      const statusCode = error.statusCode ?? error.response?.statusCode ?? StatusCodes.INTERNAL_SERVER_ERROR;
      if (KubeApiResponse.isNotFound(statusCode) && path.name !== undefined) {
        return KubeApiResponse.notFound(path);
      }
      return new RequestFailedError(KubeApiResponse.describe(operation, path), statusCode, error.body, error);
    }
    return error;
  }

  public static isFailingStatus(statusCode: number | undefined): boolean {
    return (statusCode || StatusCodes.INTERNAL_SERVER_ERROR) > StatusCodes.ACCEPTED;
  }

  public static isNotFound(statusCode: number | undefined): boolean {
    return statusCode === StatusCodes.NOT_FOUND;
  }

  private static notFound(path: ResourcePath): NotFoundError {
    const parentPath = parentPathOf(path.kind, path.namespace, path.pod) ?? '';
    return new NotFoundError(path.kind, path.name ?? '', parentPath);
  }

  private static describe(operation: ResourceOperation, path: ResourcePath): string {
    const target = path.name === undefined ? `${path.kind}s` : `${path.kind} '${path.name}'`;
    return path.namespace ? `failed to ${operation} ${target} in namespace '${path.namespace}'` : `failed to ${operation} ${target}`;
  }
}
