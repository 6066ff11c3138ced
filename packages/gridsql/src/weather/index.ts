/**
 * Weather extension: forecast table functions, name normalization, filter
 * translation, scan cursor and progress tracking
 *
 * @packageDocumentation
 */

export * from './names.js';
export * from './query-descriptor.js';
export * from './filter-translator.js';
export * from './url-builder.js';
export * from './progress.js';
export * from './scan-cursor.js';
export * from './grib-decoder.js';
export * from './gfs-forecast.js';
export * from './read-grib.js';
export * from './met-forecast.js';
export * from './functions.js';
export * from './limit-rewriter.js';
export * from './extension.js';
