// SPDX-License-Identifier: Apache-2.0

import {KubewalkError} from './kubewalk-error.js';

export class NotFoundError extends KubewalkError {
  /**
   * @param kind - the kind of resource that was looked up
   * @param resourceName - name of the missing resource
   * @param parentPath - where it was looked up, empty for cluster scoped kinds
   */
  public constructor(
    public readonly kind: string,
    public readonly resourceName: string,
    public readonly parentPath: string = '',
  ) {
    super(parentPath ? `${kind} '${resourceName}' not found in '${parentPath}'` : `${kind} '${resourceName}' not found`, {}, {
      kind,
      name: resourceName,
      parentPath,
    });
  }
}
