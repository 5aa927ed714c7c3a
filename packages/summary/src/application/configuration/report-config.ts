import {
  findConfigPath,
  loadConfigModule,
  resolveConfigPath,
  type ResolveConfigPathOptions,
} from '@lintstat/core/config';
import { z } from 'zod';

import { SEVERITY_THRESHOLDS, type SeverityThreshold } from '../../domain/severity/severity.js';

export interface ReportConfig {
  readonly minimumSeverity: SeverityThreshold;
}

export const DEFAULT_REPORT_CONFIG: ReportConfig = Object.freeze({
  minimumSeverity: 'all',
});

const reportSectionSchema = z
  .object({
    minimumSeverity: z
      .string()
      .transform((value) => value.trim().toLowerCase())
      .pipe(z.enum(SEVERITY_THRESHOLDS))
      .optional(),
  })
  .strict();

const configSchema = z
  .object({
    report: reportSectionSchema.optional(),
  })
  .passthrough();

/**
 * Validates a loaded configuration value and fills defaults for the report section.
 *
 * @param candidate - Exported configuration value.
 * @param source - Where the value came from, for error messages.
 * @throws {Error} When the value does not match the expected shape.
 */
export function parseReportConfig(candidate: unknown, source = 'configuration'): ReportConfig {
  const result = configSchema.safeParse(candidate);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid lintstat ${source}: ${issues}`);
  }

  return {
    minimumSeverity: result.data.report?.minimumSeverity ?? DEFAULT_REPORT_CONFIG.minimumSeverity,
  };
}

export interface LoadReportConfigOptions extends ResolveConfigPathOptions {}

export interface LoadedReportConfig {
  /** Absolute path of the configuration file, or `undefined` when defaults were used. */
  readonly path: string | undefined;
  readonly config: ReportConfig;
}

/**
 * Loads the report configuration from `configPath`, or from the first lintstat
 * configuration file found in `cwd`. Without any file the defaults apply; an
 * explicit `configPath` that does not exist is an error.
 */
export async function loadReportConfig(
  options: LoadReportConfigOptions = {},
): Promise<LoadedReportConfig> {
  const searchOptions = {
    ...(options.cwd === undefined ? {} : { cwd: options.cwd }),
    ...(options.candidates === undefined ? {} : { candidates: options.candidates }),
  };
  const configPath =
    options.configPath === undefined
      ? await findConfigPath(searchOptions)
      : await resolveConfigPath({ ...searchOptions, configPath: options.configPath });

  if (configPath === undefined) {
    return { path: undefined, config: DEFAULT_REPORT_CONFIG };
  }

  const loaded = await loadConfigModule<unknown>({
    path: configPath,
    ...(options.cwd === undefined ? {} : { cwd: options.cwd }),
  });

  return {
    path: loaded.path,
    config: parseReportConfig(loaded.config, `configuration at ${loaded.path}`),
  };
}
