import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { cosmiconfig, defaultLoaders, type CosmiconfigResult, type Loader } from 'cosmiconfig';

type NonNullableCosmiconfigResult = Exclude<CosmiconfigResult, null>;

export const DEFAULT_LINTSTAT_CONFIG_FILES = Object.freeze([
  'lintstat.config.mjs',
  'lintstat.config.js',
  'lintstat.config.cjs',
  'lintstat.config.json',
] as const);

export interface ResolveConfigPathOptions {
  readonly cwd?: string;
  readonly configPath?: string;
  readonly candidates?: readonly string[];
}

export interface LoadConfigModuleOptions {
  readonly path: string;
  readonly cwd?: string;
}

export interface LoadedConfigModule<TConfig = unknown> {
  readonly path: string;
  readonly directory: string;
  readonly config: TConfig;
}

const MODULE_NAME = 'lintstat';

const moduleLoader: Loader = async (filepath: string, _content: string) => {
  const importedModule: unknown = await import(pathToFileURL(filepath).href);
  if (!importedModule || typeof importedModule !== 'object') {
    return importedModule;
  }

  if ('default' in importedModule) {
    return importedModule.default;
  }
  if ('config' in importedModule) {
    return importedModule.config;
  }

  return importedModule;
};

function createExplorer(searchPlaces: readonly string[], stopDir: string) {
  return cosmiconfig(MODULE_NAME, {
    cache: false,
    searchPlaces: [...searchPlaces],
    stopDir,
    loaders: {
      '.json': defaultLoaders['.json'],
      '.js': moduleLoader,
      '.mjs': moduleLoader,
      '.cjs': moduleLoader,
    },
    transform: async (result: CosmiconfigResult) =>
      result ? transformResult(result) : result,
  });
}

/**
 * Searches for a lintstat configuration file without failing when none exists.
 *
 * @param options - Overrides for the working directory or search candidates.
 * @returns The discovered configuration path, or `undefined` when no file matches.
 */
export async function findConfigPath(
  options: Omit<ResolveConfigPathOptions, 'configPath'> = {},
): Promise<string | undefined> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const searchPlaces = options.candidates
    ? [...options.candidates]
    : [...DEFAULT_LINTSTAT_CONFIG_FILES];
  const result = await createExplorer(searchPlaces, cwd).search(cwd);
  if (!result || result.isEmpty) {
    return undefined;
  }
  return result.filepath;
}

/**
 * Determines the absolute path to a lintstat configuration file.
 *
 * @param options - Overrides for the working directory, explicit path, or search candidates.
 * @returns The resolved configuration path.
 * @throws {Error} When the configuration cannot be found in the provided locations.
 */
export async function resolveConfigPath(options: ResolveConfigPathOptions = {}): Promise<string> {
  const cwd = path.resolve(options.cwd ?? process.cwd());

  if (options.configPath) {
    const resolvedPath = path.resolve(cwd, options.configPath);
    const searchPlaces = options.candidates
      ? [...options.candidates]
      : [...DEFAULT_LINTSTAT_CONFIG_FILES];
    try {
      const loaded = await createExplorer(searchPlaces, cwd).load(resolvedPath);
      if (!loaded || loaded.isEmpty) {
        throw new Error(`Configuration file not found: ${options.configPath}`);
      }
      return loaded.filepath;
    } catch (error) {
      if (isMissingFileError(error)) {
        throw new Error(`Configuration file not found: ${options.configPath}`);
      }
      throw error;
    }
  }

  const discovered = await findConfigPath(
    options.candidates ? { cwd, candidates: options.candidates } : { cwd },
  );
  if (!discovered) {
    throw new Error('Unable to locate lintstat configuration file in the current directory.');
  }

  return discovered;
}

/**
 * Loads a configuration module, resolving any function or promise exports.
 *
 * @param options - Module loading options including the relative or absolute path.
 * @returns Loaded configuration metadata and the resolved configuration value.
 */
export async function loadConfigModule<TConfig = unknown>(
  options: LoadConfigModuleOptions,
): Promise<LoadedConfigModule<TConfig>> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const resolvedPath = path.resolve(cwd, options.path);
  const explorer = createExplorer(DEFAULT_LINTSTAT_CONFIG_FILES, path.dirname(resolvedPath));

  try {
    const result = await explorer.load(resolvedPath);
    if (!result || result.isEmpty) {
      throw new Error(`Configuration file not found at ${resolvedPath}`);
    }

    return {
      path: result.filepath,
      directory: path.dirname(result.filepath),
      config: result.config,
    } satisfies LoadedConfigModule<TConfig>;
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new Error(`Configuration file not found at ${resolvedPath}`);
    }
    throw error;
  }
}

async function transformResult(
  result: NonNullableCosmiconfigResult,
): Promise<NonNullableCosmiconfigResult> {
  const resolvedConfig = await resolveExportedValue(result.config);
  return { ...result, config: resolvedConfig };
}

async function resolveExportedValue(candidate: unknown): Promise<unknown> {
  let value = candidate;

  for (;;) {
    if (typeof value === 'function') {
      value = value();
      continue;
    }

    if (value instanceof Promise) {
      value = await value;
      continue;
    }

    return value;
  }
}

function isMissingFileError(error: unknown): error is NodeJS.ErrnoException {
  return (
    typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT'
  );
}
