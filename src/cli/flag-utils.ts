import { CliUsageError } from '../errors.js';

/** Flag name to the spellings that set it, e.g. `{ output: ['--output', '-o'] }`. */
export type FlagAliases<K extends string> = Record<K, readonly string[]>;

/**
 * Removes value flags from `args` and returns them by name. Accepts both
 * `--output dir` and `--output=dir`; a repeated flag keeps its last value.
 */
export function takeValueFlags<K extends string>(args: string[], aliases: FlagAliases<K>): Partial<Record<K, string>> {
  const values: Partial<Record<K, string>> = {};
  const names = Object.keys(aliases).filter(isFlagName(aliases));

  let index = 0;
  while (index < args.length) {
    const token = args[index] ?? '';
    const [spelling, inlineValue] = splitInlineValue(token);
    const name = names.find((candidate) => aliases[candidate].includes(spelling));
    if (name === undefined) {
      index += 1;
      continue;
    }

    if (inlineValue !== undefined) {
      values[name] = inlineValue;
      args.splice(index, 1);
      continue;
    }

    const value = args[index + 1];
    if (value === undefined) {
      throw new CliUsageError(`Flag '${spelling}' requires a value.`);
    }
    values[name] = value;
    args.splice(index, 2);
  }

  return values;
}

/**
 * Removes boolean switches from `args` and returns the names that were set.
 */
export function takeSwitches<K extends string>(args: string[], aliases: FlagAliases<K>): Set<K> {
  const names = Object.keys(aliases).filter(isFlagName(aliases));
  const switches = new Set<K>();

  let index = 0;
  while (index < args.length) {
    const token = args[index] ?? '';
    const name = names.find((candidate) => aliases[candidate].includes(token));
    if (name === undefined) {
      index += 1;
      continue;
    }
    switches.add(name);
    args.splice(index, 1);
  }

  return switches;
}

function splitInlineValue(token: string): [string, string | undefined] {
  if (!token.startsWith('--')) return [token, undefined];
  const equalsAt = token.indexOf('=');
  if (equalsAt < 0) return [token, undefined];
  return [token.slice(0, equalsAt), token.slice(equalsAt + 1)];
}

function isFlagName<K extends string>(aliases: FlagAliases<K>): (key: string) => key is K {
  return (key): key is K => Object.prototype.hasOwnProperty.call(aliases, key);
}
