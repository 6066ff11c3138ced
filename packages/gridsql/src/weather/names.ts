/**
 * Weather vocabulary
 *
 * Maps the friendly variable and level names users write in predicates to
 * the NOMADS filter tokens (`var_TMP`, `lev_surface`), and maps decoded
 * GRIB2 code triplets back to friendly names. The tables live in
 * data/vocabulary.json and data/grib-tables.json.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

// =============================================================================
// Table loading
// =============================================================================

const CodeMapSchema = z.record(z.string().regex(/^\d+$/), z.string());

const VocabularySchema = z.object({
  variables: z.record(z.string().startsWith('var_'), z.array(z.string())),
  levels: z.record(z.string().startsWith('lev_'), z.array(z.string())),
  defaultVariables: z.array(z.string()).nonempty(),
  defaultLevels: z.array(z.string()).nonempty(),
  parameters: z.array(
    z.object({
      discipline: z.number().int(),
      category: z.number().int(),
      number: z.number().int(),
      name: z.string(),
      unit: z.string(),
    })
  ),
  surfaces: CodeMapSchema,
});

const GribTablesSchema = z.object({
  disciplines: CodeMapSchema,
  surfaces: CodeMapSchema,
  parameters: z.array(
    z.object({
      discipline: z.number().int(),
      category: z.number().int(),
      /** Absent means every parameter number of the category */
      numbers: z.array(z.number().int()).optional(),
      name: z.string(),
    })
  ),
});

function loadTable<T>(file: string, schema: z.ZodType<T>): T {
  const text = readFileSync(new URL(`../../data/${file}`, import.meta.url), 'utf8');
  return schema.parse(JSON.parse(text));
}

const vocabulary = loadTable('vocabulary.json', VocabularySchema);
const gribTables = loadTable('grib-tables.json', GribTablesSchema);

function synonymIndex(groups: Record<string, string[]>): Map<string, string> {
  const index = new Map<string, string>();
  for (const [token, synonyms] of Object.entries(groups)) {
    for (const synonym of synonyms) {
      index.set(synonym.toLowerCase(), token);
    }
  }
  return index;
}

const VARIABLE_INDEX = synonymIndex(vocabulary.variables);
const LEVEL_INDEX = synonymIndex(vocabulary.levels);

/** Variables fetched when no variable predicate was pushed */
export const DEFAULT_VARIABLES: readonly string[] = vocabulary.defaultVariables;
/** Levels fetched when no level predicate was pushed */
export const DEFAULT_LEVELS: readonly string[] = vocabulary.defaultLevels;

export const UNKNOWN_NAME = 'unknown';

// =============================================================================
// Predicate vocabulary
// =============================================================================

/**
 * Canonical NOMADS variable token for a friendly name, or '' if unknown.
 *
 * Raw tokens pass through: any `var_` prefixed input is returned as `var_`
 * followed by the upper-cased suffix.
 */
export function normalizeVariable(input: string): string {
  const lower = input.toLowerCase();
  const token = VARIABLE_INDEX.get(lower);
  if (token !== undefined) return token;
  if (lower.startsWith('var_') && lower.length > 4) {
    return `var_${lower.slice(4).toUpperCase()}`;
  }
  return '';
}

/**
 * Canonical NOMADS level token for a friendly name, or '' if unknown
 */
export function normalizeLevel(input: string): string {
  const lower = input.toLowerCase();
  const token = LEVEL_INDEX.get(lower);
  if (token !== undefined) return token;
  if (lower.startsWith('lev_') && lower.length > 4) {
    return lower;
  }
  return '';
}

/** Every synonym group, keyed by canonical token */
export function variableSynonyms(): Readonly<Record<string, readonly string[]>> {
  return vocabulary.variables;
}

export function levelSynonyms(): Readonly<Record<string, readonly string[]>> {
  return vocabulary.levels;
}

// =============================================================================
// Decoded code → friendly name (gfs_forecast)
// =============================================================================

const PARAMETERS = new Map(
  vocabulary.parameters.map((p) => [`${p.discipline}/${p.category}/${p.number}`, p] as const)
);
const UNITS = new Map(vocabulary.parameters.map((p) => [p.name, p.unit] as const));

export function parameterName(discipline: number, category: number, number: number): string {
  return PARAMETERS.get(`${discipline}/${category}/${number}`)?.name ?? UNKNOWN_NAME;
}

/**
 * Level name for a fixed-surface code and its scaled value: `2m`, `10m`,
 * `<N>m` above ground, `<N>hPa` for isobaric surfaces.
 */
export function surfaceName(surfaceType: number, surfaceValue: number): string {
  switch (surfaceType) {
    case 100:
      return `${Math.trunc(surfaceValue / 100)}hPa`;
    case 103: {
      const meters = Math.trunc(surfaceValue);
      return `${meters}m`;
    }
    default:
      return vocabulary.surfaces[String(surfaceType)] ?? UNKNOWN_NAME;
  }
}

/**
 * Physical unit of a friendly variable name, null when it has none
 */
export function unitFor(variable: string): string | null {
  return UNITS.get(variable) ?? null;
}

// =============================================================================
// Decoded code → table name (read_grib)
// =============================================================================

export const GRIB_UNKNOWN = 'Unknown';

export function gribDisciplineName(code: number): string {
  return gribTables.disciplines[String(code)] ?? GRIB_UNKNOWN;
}

export function gribSurfaceName(code: number): string {
  return gribTables.surfaces[String(code)] ?? GRIB_UNKNOWN;
}

export function gribParameterName(discipline: number, category: number, number: number): string {
  const entry = gribTables.parameters.find(
    (p) =>
      p.discipline === discipline &&
      p.category === category &&
      (p.numbers === undefined || p.numbers.includes(number))
  );
  return entry?.name ?? GRIB_UNKNOWN;
}
