import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { BACKGROUND_COLORS } from '../dialog/types.js';

export const AlignSchema = z.enum(['left', 'center', 'right']);
export const BackgroundSchema = z.enum(BACKGROUND_COLORS);

const KeyListSchema = z.array(z.string().min(1)).nonempty();

export const ConfigSchema = z.object({
  colors: z
    .object({
      disable: z.boolean().optional(),
    })
    .optional(),
  dialog: z
    .object({
      align: AlignSchema.optional(),
      width: z.number().int().nonnegative().optional(),
      height: z.number().int().nonnegative().optional(),
      background: BackgroundSchema.optional(),
    })
    .optional(),
  keys: z
    .object({
      next: KeyListSchema.optional(),
      prev: KeyListSchema.optional(),
      escape: KeyListSchema.optional(),
    })
    .optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

const CONFIG_FILENAME = '.msgboxrc.json';

export function getGlobalConfigPath(): string {
  return path.join(process.env.HOME ?? process.env.USERPROFILE ?? '', '.config', 'msgbox', 'config.json');
}

export function findConfigPath(startDir: string = process.cwd()): string | null {
  let dir = startDir;
  while (true) {
    const configPath = path.join(dir, CONFIG_FILENAME);
    if (fs.existsSync(configPath)) return configPath;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Loads the explicit config file, else the nearest `.msgboxrc.json`, else the global one.
 * Missing implicit files give the defaults; a missing explicit file is an error.
 */
export function loadConfig(configPath?: string): Config {
  if (configPath !== undefined && !fs.existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }

  const pathToLoad = configPath ?? findConfigPath() ?? getGlobalConfigPath();
  if (!fs.existsSync(pathToLoad)) {
    return ConfigSchema.parse({});
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(pathToLoad, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file: ${pathToLoad}`);
    }
    throw error;
  }
  return ConfigSchema.parse(parsed);
}
