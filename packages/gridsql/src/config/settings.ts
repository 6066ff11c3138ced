/**
 * Engine settings
 *
 * Zod schemas for every setting the engine and its table functions read.
 * Settings are resolved once per database from defaults and GRIDSQL_*
 * environment variables, may be changed with `Database.set()`, and are
 * handed to table functions as a frozen snapshot at bind time.
 */

import { z } from 'zod';
import { BindError, BindErrorCode } from '../errors/index.js';

// =============================================================================
// Schemas
// =============================================================================

export const DEFAULT_USER_AGENT = 'gridsql/0.1 (+https://github.com/gridsql/gridsql)';
export const DEFAULT_GFS_BASE_URL = 'https://nomads.ncep.noaa.gov/cgi-bin/filter_gfs_0p25.pl';
export const DEFAULT_MET_BASE_URL = 'https://api.met.no/weatherapi/locationforecast/2.0/compact';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const SettingsSchema = z.object({
  /** User-Agent sent to the MET Norway API, which rejects anonymous clients */
  met_user_agent: z.string().min(1).default(DEFAULT_USER_AGENT),
  /** NOMADS GRIB filter endpoint */
  gfs_base_url: z.string().url().default(DEFAULT_GFS_BASE_URL),
  /** MET Norway locationforecast endpoint */
  met_base_url: z.string().url().default(DEFAULT_MET_BASE_URL),
  /** Per-request timeout; 0 disables it */
  http_timeout_ms: z.coerce.number().int().nonnegative().default(120_000),
  /** Rows per decoder read */
  batch_size: z.coerce.number().int().positive().max(1_000_000).default(2048),
  log_level: LogLevelSchema.default('info'),
});

export type Settings = z.infer<typeof SettingsSchema>;
export type SettingName = keyof Settings;

const SETTING_NAMES: readonly SettingName[] = [
  'met_user_agent',
  'gfs_base_url',
  'met_base_url',
  'http_timeout_ms',
  'batch_size',
  'log_level',
];

export function isSettingName(name: string): name is SettingName {
  return SETTING_NAMES.some(n => n === name);
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Resolve settings from defaults, GRIDSQL_<NAME> environment variables and
 * explicit overrides, in increasing precedence.
 */
export function loadSettings(
  overrides: Partial<Record<SettingName, unknown>> = {},
  env: NodeJS.ProcessEnv = process.env
): Settings {
  const raw: Record<string, unknown> = {};
  for (const name of SETTING_NAMES) {
    const fromEnv = env[`GRIDSQL_${name.toUpperCase()}`];
    if (fromEnv !== undefined && fromEnv !== '') raw[name] = fromEnv;
  }
  for (const [name, value] of Object.entries(overrides)) {
    if (value !== undefined) raw[name] = value;
  }

  const parsed = SettingsSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new BindError(
      BindErrorCode.INVALID_SETTING,
      `Invalid setting ${issue.path.join('.')}: ${issue.message}`
    );
  }
  return parsed.data;
}

/**
 * Return a copy of `settings` with one value changed and validated.
 */
export function updateSetting(settings: Settings, name: string, value: unknown): Settings {
  if (!isSettingName(name)) {
    throw new BindError(BindErrorCode.UNKNOWN_SETTING, `Unknown setting: ${name}`);
  }

  const parsed = SettingsSchema.shape[name].safeParse(value);
  if (!parsed.success) {
    throw new BindError(
      BindErrorCode.INVALID_SETTING,
      `Invalid value for ${name}: ${parsed.error.issues[0].message}`
    );
  }
  return { ...settings, [name]: parsed.data };
}
