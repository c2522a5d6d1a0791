import fs from 'node:fs';
import path from 'node:path';
import {
  ConfigSchema,
  findConfigPath,
  getConfigValue,
  getDefaultProjectConfigPath,
  getGlobalConfigPath,
  loadConfig,
  type Config,
} from '../config/loader.js';
import { CliUsageError } from '../errors.js';
import { takeSwitches } from './flag-utils.js';

type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };
type JsonObject = { [key: string]: JsonValue };

const USAGE = 'Usage: docxtasks config <init|get|set|list|path> [args]';

export function handleConfigCommand(args: string[]): void {
  const subcommand = args.shift();
  if (!subcommand) {
    throw new CliUsageError(USAGE);
  }

  switch (subcommand) {
    case 'init':
      runConfigInit(args);
      return;
    case 'get':
      runConfigGet(args);
      return;
    case 'set':
      runConfigSet(args);
      return;
    case 'list':
      runConfigList(args);
      return;
    case 'path':
      runConfigPath(args);
      return;
    default:
      throw new CliUsageError(`Unknown subcommand 'config ${subcommand}'.`);
  }
}

export function printConfigHelp(): void {
  console.log(`Usage: docxtasks config <subcommand> [options]

Configuration subcommands:
  init                Create a config file with every default spelled out
  get <key>           Get a config value (supports dot paths)
  set <key> <value>   Set a config value (supports dot paths)
  list                List all config values
  path                Show config paths and active source

Examples:
  docxtasks config init
  docxtasks config get document.headingStyles.section
  docxtasks config set tasks.defaultProject "Tower B"
  docxtasks config set document.manufacturerHeadings "Manufacturer,Supplier,Vendor"
  docxtasks config list --json
`);
}

function runConfigInit(args: string[]): void {
  const switches = takeSwitches(args, { global: ['--global'], force: ['--force'], json: ['--json'] });
  if (args.length > 0) {
    throw new CliUsageError(`Unexpected arguments: ${args.join(' ')}`);
  }

  const targetPath = switches.has('global') ? getGlobalConfigPath() : getDefaultProjectConfigPath(process.cwd());

  if (fs.existsSync(targetPath) && !switches.has('force')) {
    throw new CliUsageError(`Config already exists at ${targetPath}. Use --force to overwrite.`);
  }

  const config: Config = ConfigSchema.parse({});
  writeConfigFile(targetPath, config);

  if (switches.has('json')) {
    console.log(JSON.stringify({ success: true, path: targetPath, config }, null, 2));
    return;
  }

  console.log(`Created: ${targetPath}`);
}

function runConfigGet(args: string[]): void {
  const switches = takeSwitches(args, { json: ['--json'] });

  const key = args[0];
  if (key === undefined) {
    throw new CliUsageError('Usage: docxtasks config get <key>');
  }

  const { config, source } = loadActiveConfigWithSource();
  const value = requireConfigValue(config, key);

  if (switches.has('json')) {
    console.log(JSON.stringify({ key, value, source }, null, 2));
    return;
  }

  console.log(`${key}: ${JSON.stringify(value)}`);
  console.log(`  Source: ${source}`);
}

function runConfigSet(args: string[]): void {
  const switches = takeSwitches(args, { global: ['--global'], json: ['--json'] });

  const [key, rawValue] = args;
  if (key === undefined || rawValue === undefined) {
    throw new CliUsageError('Usage: docxtasks config set <key> <value>');
  }

  const targetPath = switches.has('global') ? getGlobalConfigPath() : getDefaultProjectConfigPath(process.cwd());

  const existing = fs.existsSync(targetPath) ? loadConfig(targetPath) : ConfigSchema.parse({});
  const current = requireConfigValue(existing, key);
  const jsonValue = parseValue(rawValue, Array.isArray(current));
  const updated = setByPath(toJson(existing), key, jsonValue);
  const parsed = ConfigSchema.safeParse(updated);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new CliUsageError(`Invalid value for '${key}': ${issue?.message ?? 'rejected by config schema'}`);
  }

  writeConfigFile(targetPath, parsed.data);

  if (switches.has('json')) {
    console.log(JSON.stringify({ success: true, key, value: jsonValue, path: targetPath }, null, 2));
    return;
  }

  console.log(`Set ${key} = ${JSON.stringify(jsonValue)}`);
  console.log(`  File: ${targetPath}`);
}

function runConfigList(args: string[]): void {
  const switches = takeSwitches(args, { json: ['--json'] });
  if (args.length > 0) {
    throw new CliUsageError(`Unexpected arguments: ${args.join(' ')}`);
  }

  const { config, source } = loadActiveConfigWithSource();
  const flattened = flattenObject(toJson(config));

  if (switches.has('json')) {
    console.log(JSON.stringify({ source, config, flattened }, null, 2));
    return;
  }

  console.log(`Source: ${source}`);
  for (const [key, value] of Object.entries(flattened)) {
    console.log(`${key}: ${JSON.stringify(value)}`);
  }
}

function runConfigPath(args: string[]): void {
  const switches = takeSwitches(args, { json: ['--json'] });
  if (args.length > 0) {
    throw new CliUsageError(`Unexpected arguments: ${args.join(' ')}`);
  }

  const projectPath = findConfigPath();
  const globalPath = getGlobalConfigPath();
  const active = projectPath ?? globalPath;

  if (switches.has('json')) {
    console.log(JSON.stringify({ project: projectPath, global: globalPath, active }, null, 2));
    return;
  }

  console.log(`Project config: ${projectPath ?? '(none)'}`);
  console.log(`Global config: ${globalPath}`);
  console.log('');
  console.log(`Active: ${active}`);
}

function writeConfigFile(filePath: string, config: Config): void {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  fs.writeFileSync(filePath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
}

function loadActiveConfigWithSource(): { config: Config; source: string } {
  const source = findConfigPath() ?? getGlobalConfigPath();
  return { config: loadConfig(source), source };
}

function toJson(config: Config): JsonObject {
  return config;
}

function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Only keys the schema defines can be read or written; zod would drop an
 * unknown key on save.
 */
function requireConfigValue(config: Config, key: string): unknown {
  const value = getConfigValue(config, key);
  if (value === undefined) {
    throw new CliUsageError(`Unknown config key '${key}'. Run 'docxtasks config list' to see available keys.`);
  }
  return value;
}

function setByPath(root: JsonObject, keyPath: string, newValue: JsonValue): JsonObject {
  const parts = keyPath.split('.').filter(Boolean);
  const clone = structuredClone(root);
  let current: JsonObject = clone;

  for (const [index, part] of parts.entries()) {
    if (index === parts.length - 1) {
      current[part] = newValue;
      break;
    }

    const next = current[part];
    if (next !== undefined && !isJsonObject(next)) {
      throw new CliUsageError(`Cannot set '${keyPath}' on non-object value.`);
    }
    const child: JsonObject = next ?? {};
    current[part] = child;
    current = child;
  }

  return clone;
}

function flattenObject(value: JsonObject, prefix: string = ''): Record<string, JsonValue> {
  const result: Record<string, JsonValue> = {};
  for (const [key, child] of Object.entries(value)) {
    const nextPrefix = prefix ? `${prefix}.${key}` : key;
    if (isJsonObject(child)) {
      Object.assign(result, flattenObject(child, nextPrefix));
    } else {
      result[nextPrefix] = child;
    }
  }
  return result;
}

function parseValue(raw: string, isList: boolean): JsonValue {
  const trimmed = raw.trim();

  if (
    trimmed === 'null' ||
    trimmed === 'true' ||
    trimmed === 'false' ||
    trimmed.startsWith('{') ||
    trimmed.startsWith('[') ||
    /^-?\d+(\.\d+)?$/.test(trimmed)
  ) {
    try {
      const parsed: JsonValue = JSON.parse(trimmed);
      return parsed;
    } catch {
      // Not JSON after all; keep it as text.
    }
  }

  // Comma-separated shorthand for list keys.
  if (isList) {
    return trimmed
      .split(',')
      .map((v) => v.trim())
      .filter(Boolean);
  }

  return trimmed;
}
