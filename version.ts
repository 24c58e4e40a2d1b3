// SPDX-License-Identifier: Apache-2.0

import {fileURLToPath} from 'node:url';
import path from 'node:path';
import fs from 'node:fs';

/**
 * The kubewalk version from package.json, found beside this file when run from sources or one level up when run from
 * dist/.
 */
export function getKubewalkVersion(): string {
  if (process.env.npm_package_version) {
    return process.env.npm_package_version;
  }

  const directory: string = path.dirname(fileURLToPath(import.meta.url));
  for (const candidate of [path.resolve(directory, 'package.json'), path.resolve(directory, '..', 'package.json')]) {
    if (!fs.existsSync(candidate)) {
      continue;
    }
    const packageJson: {version?: unknown} = JSON.parse(fs.readFileSync(candidate, 'utf8'));
    if (typeof packageJson.version === 'string') {
      return packageJson.version;
    }
  }
  return '0.0.0';
}
