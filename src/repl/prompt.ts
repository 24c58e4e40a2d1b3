// SPDX-License-Identifier: Apache-2.0

import chalk, {Chalk, type ChalkInstance} from 'chalk';
import {type NavigationPath, type SegmentKind} from '../core/navigation/navigation-path.js';

const PLAIN = new Chalk({level: 0});

const SEGMENT_COLORS: Readonly<Record<SegmentKind, (colors: ChalkInstance, text: string) => string>> = {
  context: (colors, text) => colors.cyan(text),
  namespace: (colors, text) => colors.green(text),
  pod: (colors, text) => colors.yellow(text),
  container: (colors, text) => colors.magenta(text),
};

/**
 * `[context][namespace][pod][container] > `, showing only the selected segments.
 */
export function renderPrompt(path: NavigationPath, color: boolean = true): string {
  const colors = color ? chalk : PLAIN;
  const segments = path
    .list()
    .map(segment => `[${SEGMENT_COLORS[segment.kind](colors, segment.name)}]`)
    .join('');
  return segments ? `${segments} > ` : '> ';
}
