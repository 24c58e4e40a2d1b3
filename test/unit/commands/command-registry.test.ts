// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';

import {CommandRegistry} from '../../../src/commands/command-registry.js';
import {type CommandDefinition} from '../../../src/commands/command-definition.js';
import {DEFAULT_COMMANDS, defaultRegistry} from '../../../src/commands/definitions/index.js';
import {IllegalArgumentError} from '../../../src/core/errors/illegal-argument-error.js';

function command(name: string, aliases: string[] = []): CommandDefinition {
  return {name, aliases, summary: name, usage: name, run: async () => ({type: 'lines', lines: []})};
}

describe('CommandRegistry', () => {
  it('should find commands by name and alias, ignoring case', () => {
    const registry = new CommandRegistry([command('namespace', ['ns'])]);
    expect(registry.find('namespace')?.name).to.equal('namespace');
    expect(registry.find('NS')?.name).to.equal('namespace');
    expect(registry.find('pod')).to.be.undefined;
  });

  it('should reject a verb registered twice', () => {
    expect(() => new CommandRegistry([command('up'), command('climb', ['up'])])).to.throw(
      IllegalArgumentError,
      "command 'up' is registered twice",
    );
  });

  it('should keep the registration order and sort the verbs', () => {
    const registry = new CommandRegistry([command('quit', ['exit']), command('help')]);
    expect(registry.list().map(definition => definition.name)).to.deep.equal(['quit', 'help']);
    expect(registry.verbs()).to.deep.equal(['exit', 'help', 'quit']);
  });

  it('should register every default command', () => {
    const registry = defaultRegistry();
    expect(registry.list()).to.have.lengthOf(DEFAULT_COMMANDS.length);
    for (const verb of ['ctx', 'ns', 'logs', 'exec', 'delete', 'refresh', '?']) {
      expect(registry.find(verb), verb).to.not.be.undefined;
    }
  });
});
