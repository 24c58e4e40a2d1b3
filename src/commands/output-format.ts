// SPDX-License-Identifier: Apache-2.0

import {Duration} from '../core/time/duration.js';
import {errorMessage} from '../core/helpers.js';
import {type CachedListing} from '../core/cache/resource-cache.js';

const COLUMN_GAP = '   ';

/**
 * Left-aligned columns, header first. Trailing whitespace is trimmed from every line.
 */
export function formatTable(headers: readonly string[], rows: readonly (readonly string[])[]): string[] {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map(row => (row[column] ?? '').length)),
  );
  const render = (cells: readonly string[]): string =>
    widths
      .map((width, column) => (cells[column] ?? '').padEnd(width))
      .join(COLUMN_GAP)
      .trimEnd();

  return [render(headers), ...rows.map(render)];
}

export function formatAge(since: Date | undefined, now: Date = new Date()): string {
  if (!since) {
    return '<unknown>';
  }
  const age = Duration.between(since, now);
  return age.toMillis() < 1000 ? '0s' : age.toString();
}

/** A warning line for a stale listing, or nothing. */
export function stalenessWarning(listing: CachedListing): string[] {
  if (!listing.stale) {
    return [];
  }
  const age = listing.age ? ` ${listing.age} ago` : '';
  const reason = listing.lastError === undefined ? '' : `: ${errorMessage(listing.lastError)}`;
  return [`warning: listing may be out of date (last refreshed${age}${reason})`];
}
