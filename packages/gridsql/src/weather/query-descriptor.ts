/**
 * GFS query descriptor
 *
 * The remote query one gfs_forecast scan will issue. Created at bind time,
 * narrowed by filter pushdown and limit pushdown during planning, and read
 * only once execution starts.
 */

export interface BoundingBox {
  /** Degrees north, within [-90, 90] */
  latMin: number;
  latMax: number;
  /** Degrees east, within [0, 360) */
  lonMin: number;
  lonMax: number;
}

export interface QueryDescriptor {
  /** YYYYMMDD */
  runDate: string;
  /** 0, 6, 12 or 18; null when not constrained */
  runHour: number | null;
  /** Resource sequence, fetched in list order */
  forecastHours: number[];
  /** Canonical `var_` tokens; empty means the default set */
  variables: string[];
  /** Canonical `lev_` tokens; empty means the default set */
  levels: string[];
  boundingBox: BoundingBox;
  hasBbox: boolean;
  /** Maximum rows the scan emits; 0 means unlimited */
  rowLimit: number;
}

export const RUN_HOURS: readonly number[] = [0, 6, 12, 18];

export const WHOLE_GLOBE: Readonly<BoundingBox> = {
  latMin: -90,
  latMax: 90,
  lonMin: 0,
  lonMax: 360,
};

/**
 * YYYYMMDD of a date, in UTC
 */
export function formatRunDate(date: Date): string {
  const y = String(date.getUTCFullYear()).padStart(4, '0');
  const m = String(date.getUTCMonth() + 1).padStart(2, '0');
  const d = String(date.getUTCDate()).padStart(2, '0');
  return `${y}${m}${d}`;
}

export function createQueryDescriptor(now: Date = new Date()): QueryDescriptor {
  return {
    runDate: formatRunDate(now),
    runHour: null,
    forecastHours: [0],
    variables: [],
    levels: [],
    boundingBox: { ...WHOLE_GLOBE },
    hasBbox: false,
    rowLimit: 0,
  };
}

/**
 * Map any longitude into [0, 360)
 */
export function normalizeLongitude(lon: number): number {
  return ((lon % 360) + 360) % 360;
}

/**
 * Map a longitude in [0, 360) to the (-180, 180] range rows are emitted in
 */
export function toOutputLongitude(lon: number): number {
  return lon > 180 ? lon - 360 : lon;
}

export function clampLatitude(lat: number): number {
  return Math.min(90, Math.max(-90, lat));
}
