// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';

import {formatAge, formatTable, stalenessWarning} from '../../../src/commands/output-format.js';
import {Duration} from '../../../src/core/time/duration.js';
import {RequestFailedError} from '../../../src/core/errors/connection-errors.js';

describe('output format', () => {
  describe('formatTable', () => {
    it('should align columns and trim trailing blanks', () => {
      expect(
        formatTable(
          ['NAME', 'STATUS'],
          [
            ['web-0', 'Running'],
            ['db', ''],
          ],
        ),
      ).to.deep.equal(['NAME    STATUS', 'web-0   Running', 'db']);
    });

    it('should print only the header for no rows', () => {
      expect(formatTable(['NAME', 'AGE'], [])).to.deep.equal(['NAME   AGE']);
    });
  });

  describe('formatAge', () => {
    const now = new Date(Date.UTC(2025, 0, 1, 12));

    it('should format the time since a moment', () => {
      expect(formatAge(new Date(now.getTime() - 90_000), now)).to.equal('1m30s');
      expect(formatAge(new Date(now.getTime() - 3 * 86_400_000), now)).to.equal('3d0h');
    });

    it('should round sub-second ages down', () => {
      expect(formatAge(new Date(now.getTime() - 400), now)).to.equal('0s');
    });

    it('should say when the moment is unknown', () => {
      expect(formatAge(undefined, now)).to.equal('<unknown>');
    });
  });

  describe('stalenessWarning', () => {
    it('should say nothing for a fresh listing', () => {
      expect(stalenessWarning({entries: [], loaded: true, stale: false, age: Duration.ofSeconds(3)})).to.be.empty;
    });

    it('should give the age and the last error', () => {
      expect(
        stalenessWarning({
          entries: [],
          loaded: true,
          stale: true,
          age: Duration.ofSeconds(75),
          lastError: new RequestFailedError('forbidden', 403),
        }),
      ).to.deep.equal(['warning: listing may be out of date (last refreshed 1m15s ago: forbidden, statusCode: 403)']);
    });

    it('should leave out what is not known', () => {
      expect(stalenessWarning({entries: [], loaded: true, stale: true})).to.deep.equal([
        'warning: listing may be out of date (last refreshed)',
      ]);
    });
  });
});
