export type PackageName = `@lintstat/${string}`;

export interface PackageManifest {
  readonly name: PackageName;
  readonly summary: string;
}

export type FrozenManifest<T extends PackageManifest = PackageManifest> = Readonly<T>;

export const createManifest = <T extends PackageManifest>(manifest: T): FrozenManifest<T> =>
  Object.freeze({ ...manifest });

export {
  createLevelFilteredLogger,
  JsonLineLogger,
  LOG_LEVELS,
  noopLogger,
  PrettyLineLogger,
  type LogLevel,
  type StructuredLogEvent,
  type StructuredLogger,
} from './logging/index.js';

export { getOrCreate, incrementCount } from './collections/index.js';

export {
  formatPercentage,
  formatUnknownError,
  serialiseError,
  writeLine,
  type WritableTarget,
} from './reporting/index.js';

export {
  DEFAULT_LINTSTAT_CONFIG_FILES,
  findConfigPath,
  loadConfigModule,
  resolveConfigPath,
  type LoadConfigModuleOptions,
  type LoadedConfigModule,
  type ResolveConfigPathOptions,
} from './config/index.js';

const manifestDefinition = {
  name: '@lintstat/core',
  summary:
    'Shared logging, reporting, configuration, and collection utilities for lintstat ' +
    'packages.',
} as const satisfies PackageManifest;

export const manifest = createManifest(manifestDefinition);

export const describe = (): PackageManifest => ({ ...manifest });
