// SPDX-License-Identifier: Apache-2.0

import {InvalidArgumentError} from '../core/errors/command-errors.js';
import {type CommandDefinition, type OptionSpec} from './command-definition.js';
import {type OptionValue, type ParsedArguments} from './command-invocation.js';

/**
 * Splits the words following a verb into options and positionals. `--name value`, `--name=value`, `-x value` and
 * clustered boolean short options (`-ft`) are accepted; `--` ends option parsing.
 *
 * @throws InvalidArgumentError - unknown option, missing or malformed value, or wrong number of arguments
 */
export function parseArguments(definition: CommandDefinition, words: readonly string[]): ParsedArguments {
  const specs = definition.options ?? [];
  const options = new Map<string, OptionValue>();
  const positionals: string[] = [];
  let optionsEnded = false;

  for (let index = 0; index < words.length; index++) {
    const word = words[index];

    if (optionsEnded || !word.startsWith('-') || word === '-' || /^-\d/.test(word)) {
      positionals.push(word);
      optionsEnded ||= definition.passthrough === true;
      continue;
    }
    if (word === '--') {
      optionsEnded = true;
      continue;
    }

    if (word.startsWith('--')) {
      const [name, inline] = splitInline(word.slice(2));
      const spec = specs.find(candidate => candidate.name === name);
      if (!spec) {
        throw new InvalidArgumentError(`unknown option '--${name}' for '${definition.name}'`, word);
      }
      if (spec.type === 'boolean') {
        if (inline !== undefined) {
          throw new InvalidArgumentError(`option '--${name}' takes no value`, word);
        }
        options.set(spec.name, true);
      } else {
        const raw = inline ?? words[++index];
        options.set(spec.name, valueOf(spec, raw));
      }
      continue;
    }

    const letters = word.slice(1);
    for (const [position, letter] of [...letters].entries()) {
      const spec = specs.find(candidate => candidate.short === letter);
      if (!spec) {
        throw new InvalidArgumentError(`unknown option '-${letter}' for '${definition.name}'`, word);
      }
      if (spec.type === 'boolean') {
        options.set(spec.name, true);
        continue;
      }
      const rest = letters.slice(position + 1);
      options.set(spec.name, valueOf(spec, rest.length > 0 ? rest : words[++index]));
      break;
    }
  }

  const arity = definition.arguments ?? {min: 0, max: 0};
  if (positionals.length < arity.min || positionals.length > arity.max) {
    throw new InvalidArgumentError(`usage: ${definition.usage}`);
  }

  return {positionals, options};
}

function splitInline(text: string): [string, string | undefined] {
  const equals = text.indexOf('=');
  return equals === -1 ? [text, undefined] : [text.slice(0, equals), text.slice(equals + 1)];
}

function valueOf(spec: OptionSpec, raw: string | undefined): OptionValue {
  if (raw === undefined) {
    throw new InvalidArgumentError(`option '--${spec.name}' needs a value`, spec.name);
  }
  if (spec.type === 'number') {
    if (!/^\d+$/.test(raw)) {
      throw new InvalidArgumentError(`option '--${spec.name}' expects a non-negative integer, got '${raw}'`, raw);
    }
    return Number.parseInt(raw, 10);
  }
  return raw;
}
