import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

const RoleStylesSchema = z.object({
  section: z.string().default('Heading 1'),
  productType: z.string().default('Heading 2'),
  manufacturer: z.string().default('Heading 3'),
  description: z.string().default('Heading 4'),
});

const RoleVariationsSchema = z.object({
  section: z.array(z.string()).default(['heading 1', 'title 1', 'h1', 'header 1', 'section']),
  productType: z.array(z.string()).default(['heading 2', 'title 2', 'h2', 'header 2', 'subsection']),
  manufacturer: z.array(z.string()).default(['heading 3', 'title 3', 'h3', 'header 3']),
  description: z.array(z.string()).default(['heading 4', 'title 4', 'h4', 'header 4']),
});

export const ConfigSchema = z.object({
  document: z
    .object({
      headingStyles: RoleStylesSchema.default({}),
      headingStyleVariations: RoleVariationsSchema.default({}),
      productsHeading: z.string().default('Products'),
      productsHeadingVariations: z
        .array(z.string())
        .default([
          'products',
          'product list',
          'products and services',
          'product information',
          'product specs',
          'product specifications',
        ]),
      manufacturerHeadings: z.array(z.string()).default(['Manufacturer', 'Manufacturers']),
    })
    .default({}),
  tasks: z
    .object({
      defaultSection: z.string().default('CA Submittal Check-list'),
      defaultProject: z.string().default(''),
      rootNotes: z.string().default('Root task for document'),
    })
    .default({}),
  output: z
    .object({
      directory: z.string().default('output'),
      encoding: z.enum(['utf-8', 'utf16le', 'latin1']).default('utf-8'),
      bom: z.boolean().default(false),
    })
    .default({}),
  processing: z
    .object({
      concurrency: z.number().int().min(1).max(32).default(4),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

const CONFIG_FILENAME = '.docxtasks.json';

export function getDefaultProjectConfigPath(startDir: string = process.cwd()): string {
  return path.join(startDir, CONFIG_FILENAME);
}

export function getGlobalConfigPath(): string {
  // Recompute each call so tests that stub HOME behave correctly.
  return path.join(process.env.HOME ?? process.env.USERPROFILE ?? '', '.config', 'docxtasks', 'config.json');
}

export function findConfigPath(startDir: string = process.cwd()): string | null {
  let dir = startDir;
  while (true) {
    const configPath = path.join(dir, CONFIG_FILENAME);
    if (fs.existsSync(configPath)) {
      return configPath;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      break;
    }
    dir = parent;
  }
  return null;
}

export function loadConfig(configPath?: string): Config {
  const pathToLoad = configPath ?? findConfigPath() ?? getGlobalConfigPath();

  if (!fs.existsSync(pathToLoad)) {
    return ConfigSchema.parse({});
  }

  const content = fs.readFileSync(pathToLoad, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file: ${pathToLoad}`);
    }
    throw error;
  }
  return ConfigSchema.parse(parsed);
}

/**
 * Reads a value by dotted path (e.g. `tasks.defaultSection`).
 * Returns undefined when any segment is missing.
 */
export function getConfigValue(config: Config, keyPath: string): unknown {
  const parts = keyPath.split('.').filter(Boolean);
  let current: unknown = config;
  for (const part of parts) {
    if (!isPlainObject(current) || !(part in current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

export function resolveOutputDir(config: Config, outputFlag?: string): string {
  return outputFlag ?? config.output.directory;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
