// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';

import {parseArguments} from '../../../src/commands/command-parser.js';
import {logsCommand, execCommand} from '../../../src/commands/definitions/stream-commands.js';
import {deleteCommand} from '../../../src/commands/definitions/resource-commands.js';
import {upCommand} from '../../../src/commands/definitions/navigation-commands.js';
import {InvalidArgumentError} from '../../../src/core/errors/command-errors.js';

describe('parseArguments', () => {
  it('should read long options with separate and inline values', () => {
    const parsed = parseArguments(logsCommand, ['--follow', '--container', 'app', '--tail=20']);
    expect(Object.fromEntries(parsed.options)).to.deep.equal({follow: true, container: 'app', tail: 20});
    expect(parsed.positionals).to.be.empty;
  });

  it('should read clustered short options and a trailing value', () => {
    const parsed = parseArguments(logsCommand, ['-ftc', 'sidecar']);
    expect(Object.fromEntries(parsed.options)).to.deep.equal({follow: true, timestamps: true, container: 'sidecar'});
  });

  it('should read a value attached to a short option', () => {
    const parsed = parseArguments(logsCommand, ['-capp']);
    expect(parsed.options.get('container')).to.equal('app');
  });

  it('should reject unknown options', () => {
    expect(() => parseArguments(logsCommand, ['--everything'])).to.throw(
      InvalidArgumentError,
      "unknown option '--everything' for 'logs'",
    );
    expect(() => parseArguments(logsCommand, ['-x'])).to.throw(InvalidArgumentError, "unknown option '-x' for 'logs'");
  });

  it('should validate numeric values', () => {
    expect(() => parseArguments(logsCommand, ['--tail', 'ten'])).to.throw(
      InvalidArgumentError,
      "option '--tail' expects a non-negative integer, got 'ten'",
    );
    expect(() => parseArguments(deleteCommand, ['--grace'])).to.throw(InvalidArgumentError, "option '--grace' needs a value");
  });

  it('should refuse a value for a boolean option', () => {
    expect(() => parseArguments(deleteCommand, ['--yes=no'])).to.throw(InvalidArgumentError, "option '--yes' takes no value");
  });

  it('should check the number of positional arguments', () => {
    expect(() => parseArguments(upCommand, ['1', '2'])).to.throw(InvalidArgumentError, 'usage: up [levels]');
    expect(() => parseArguments(execCommand, [])).to.throw(InvalidArgumentError, 'usage: exec');
    expect(() => parseArguments(logsCommand, ['extra'])).to.throw(InvalidArgumentError);
  });

  it('should treat negative numbers as positionals', () => {
    expect(parseArguments(upCommand, ['-1']).positionals).to.deep.equal(['-1']);
  });

  it('should keep everything after the command of a passthrough verb', () => {
    const parsed = parseArguments(execCommand, ['-c', 'app', 'ls', '-la', '--color=never', '/tmp']);
    expect(parsed.options.get('container')).to.equal('app');
    expect(parsed.positionals).to.deep.equal(['ls', '-la', '--color=never', '/tmp']);
  });

  it('should stop reading options after a double dash', () => {
    const parsed = parseArguments(execCommand, ['--', '-c', 'app']);
    expect(parsed.options.size).to.equal(0);
    expect(parsed.positionals).to.deep.equal(['-c', 'app']);
  });
});
