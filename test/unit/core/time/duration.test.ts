// SPDX-License-Identifier: Apache-2.0

import {describe, it} from 'mocha';
import {expect} from 'chai';
import {Duration} from '../../../../src/core/time/duration.js';
import {IllegalArgumentError} from '../../../../src/core/errors/illegal-argument-error.js';

describe('Duration', () => {
  it('should return the zero singleton for an empty duration', () => {
    expect(Duration.ofMillis(0)).to.equal(Duration.ZERO);
    expect(Duration.ofSeconds(0).isZero()).to.be.true;
  });

  it('should convert between units', () => {
    expect(Duration.ofSeconds(2).toMillis()).to.equal(2000);
    expect(Duration.ofMinutes(1).toSeconds()).to.equal(60);
    expect(Duration.ofMillis(1999).toSeconds()).to.equal(1);
    expect(Duration.ofMillis(1.9).toMillis()).to.equal(1);
  });

  it('plus zero returns this', () => {
    const t = Duration.ofSeconds(-1);
    expect(t.plus(Duration.ZERO)).to.equal(t);
  });

  it('multipliedBy one returns this', () => {
    const t = Duration.ofMillis(250);
    expect(t.multipliedBy(1)).to.equal(t);
    expect(t.multipliedBy(4).equals(Duration.ofSeconds(1))).to.be.true;
  });

  it('should measure the time between two instants', () => {
    const start = new Date('2024-05-01T10:00:00Z');
    const end = new Date('2024-05-01T10:01:30Z');
    expect(Duration.between(start, end).toSeconds()).to.equal(90);
    expect(Duration.between(end, start).isNegative()).to.be.true;
  });

  it('should compare durations', () => {
    expect(Duration.ofSeconds(1).compareTo(Duration.ofMillis(999))).to.equal(1);
    expect(Duration.ofSeconds(1).compareTo(Duration.ofMillis(1000))).to.equal(0);
    expect(Duration.ofSeconds(1).compareTo(Duration.ofSeconds(2))).to.equal(-1);
  });

  it('should reject infinite durations', () => {
    expect(() => Duration.ofMillis(Number.POSITIVE_INFINITY)).to.throw(IllegalArgumentError);
  });

  describe('toString', () => {
    const cases: Array<{duration: Duration; expected: string}> = [
      {duration: Duration.ofMillis(250), expected: '250ms'},
      {duration: Duration.ofSeconds(45), expected: '45s'},
      {duration: Duration.ofSeconds(125), expected: '2m5s'},
      {duration: Duration.ofMinutes(62), expected: '1h2m'},
      {duration: Duration.ofMinutes(60 * 51), expected: '2d3h'},
      {duration: Duration.ofSeconds(-3), expected: '-3s'},
    ];

    for (const {duration, expected} of cases) {
      it(`should format ${duration.toMillis()}ms as ${expected}`, () => {
        expect(duration.toString()).to.equal(expected);
      });
    }
  });
});
