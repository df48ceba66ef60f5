import * as fs from 'fs-extra';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { MaintenanceError, errorMessage } from './errors';

export const CONFIG_NAME = 'mmr.config';

/**
 * Zod schema for the maintenance configuration (config/mmr.config.json)
 */
const MaintenanceConfigSchema = z.object({
  server: z.string().min(1).default('mtx01.cc'),
  forwardedHost: z.string().min(1).default('mtx01.cc'),
  accessToken: z
    .string()
    .optional()
    .transform((value) => (value ? value : undefined)),
  requestTimeoutMs: z.number().int().positive().default(600_000),
  paths: z
    .object({
      uploadsFile: z.string().default('backup/uploads'),
      packsDir: z.string().default('stickerpicker/packs'),
      thumbnailsDir: z.string().default('stickerpicker/packs/thumbnails'),
      removedLog: z.string().default('backup/uploads_purpose_none.ndjson'),
    })
    .default({}),
});

export type MaintenanceConfig = z.infer<typeof MaintenanceConfigSchema>;

/**
 * Directory of the nearest package.json above this module, so defaults stay
 * the same whether the commands run from sources or from dist/.
 */
export function findProjectRoot(startDir: string = __dirname): string {
  let dir = startDir;
  for (;;) {
    if (fs.pathExistsSync(path.join(dir, 'package.json'))) {
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return path.resolve(__dirname, '..', '..');
    }
    dir = parent;
  }
}

export class ConfigManager {
  private static configCache: Map<string, MaintenanceConfig> = new Map();
  private static envLoaded = false;

  /**
   * Load `.env.local` then `.env` from the project root (first value wins)
   */
  static loadEnv(rootDir: string = findProjectRoot()): void {
    if (this.envLoaded) return;
    dotenv.config({ path: path.join(rootDir, '.env.local') });
    dotenv.config({ path: path.join(rootDir, '.env') });
    this.envLoaded = true;
  }

  /**
   * Load and validate the maintenance configuration. Relative paths are
   * resolved against `rootDir`. A missing config file means all defaults.
   */
  static async loadMaintenanceConfig(rootDir: string = findProjectRoot()): Promise<MaintenanceConfig> {
    const cached = this.configCache.get(rootDir);
    if (cached) {
      return cached;
    }

    const configPath = path.join(rootDir, 'config', `${CONFIG_NAME}.json`);

    let raw: unknown = {};
    if (await fs.pathExists(configPath)) {
      try {
        const content = await fs.readFile(configPath, 'utf-8');
        raw = JSON.parse(content);
      } catch (error) {
        throw new MaintenanceError(
          `Failed to load configuration ${configPath}: ${errorMessage(error)}`,
          'CONFIG_INVALID',
          configPath
        );
      }
    }

    const result = MaintenanceConfigSchema.safeParse(this.replaceEnvVars(raw));
    if (!result.success) {
      const errors = result.error.errors.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
      throw new MaintenanceError(
        `Configuration validation failed for ${CONFIG_NAME}:\n${errors}`,
        'CONFIG_INVALID',
        configPath
      );
    }

    const config = result.data;
    const resolved: MaintenanceConfig = {
      ...config,
      paths: {
        uploadsFile: path.resolve(rootDir, config.paths.uploadsFile),
        packsDir: path.resolve(rootDir, config.paths.packsDir),
        thumbnailsDir: path.resolve(rootDir, config.paths.thumbnailsDir),
        removedLog: path.resolve(rootDir, config.paths.removedLog),
      },
    };

    this.configCache.set(rootDir, resolved);
    return resolved;
  }

  static clearCache(): void {
    this.configCache.clear();
  }

  /**
   * Replace `${VAR}` and `${VAR:-fallback}` placeholders with environment values
   */
  static replaceEnvVars(value: unknown): unknown {
    if (typeof value === 'string') {
      return value.replace(/\$\{([^}:]+)(?::-([^}]*))?\}/g, (_match, varName: string, fallback?: string) => {
        const envValue = process.env[varName];
        if (envValue !== undefined && envValue !== '') {
          return envValue;
        }
        if (fallback !== undefined) {
          return fallback;
        }
        throw new MaintenanceError(`Environment variable ${varName} is not defined`, 'CONFIG_INVALID');
      });
    }

    if (Array.isArray(value)) {
      return value.map((item) => this.replaceEnvVars(item));
    }

    if (value !== null && typeof value === 'object') {
      const result: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(value)) {
        result[key] = this.replaceEnvVars(item);
      }
      return result;
    }

    return value;
  }
}
