/**
 * NOMADS GRIB filter URLs
 */

import { DEFAULT_GFS_BASE_URL } from '../config/settings.js';
import { DEFAULT_LEVELS, DEFAULT_VARIABLES } from './names.js';
import { WHOLE_GLOBE, type QueryDescriptor } from './query-descriptor.js';

const pad = (value: number, width: number): string => String(value).padStart(width, '0');

/**
 * URL of the 0.25° GFS file for one forecast hour of the descriptor's run,
 * filtered to its variables, levels and bounding box.
 */
export function buildGfsUrl(
  descriptor: QueryDescriptor,
  forecastHour: number,
  baseUrl: string = DEFAULT_GFS_BASE_URL
): string {
  const hh = pad(descriptor.runHour ?? 0, 2);
  const fff = pad(forecastHour, 3);

  let url = `${baseUrl}?dir=%2Fgfs.${descriptor.runDate}%2F${hh}%2Fatmos`;
  url += `&file=gfs.t${hh}z.pgrb2.0p25.f${fff}`;

  const variables = descriptor.variables.length > 0 ? descriptor.variables : DEFAULT_VARIABLES;
  for (const variable of variables) {
    url += `&${variable}=on`;
  }

  const levels = descriptor.levels.length > 0 ? descriptor.levels : DEFAULT_LEVELS;
  for (const level of levels) {
    url += `&${level}=on`;
  }

  const box = descriptor.hasBbox ? descriptor.boundingBox : WHOLE_GLOBE;
  url += `&subregion=&toplat=${Math.trunc(box.latMax)}&bottomlat=${Math.trunc(box.latMin)}`;
  url += `&leftlon=${Math.trunc(box.lonMin)}&rightlon=${Math.trunc(box.lonMax)}`;

  return url;
}
