/**
 * vgrib2 ships no type declarations. Only the entry points this package
 * calls are declared; the packets are validated where they are read.
 */
declare module 'vgrib2' {
  export const GRIB: {
    /** One packet per GRIB2 message, with code tables resolved to names */
    parse(buffer: Buffer): unknown[];
    /** One packet per GRIB2 message, codes left numeric */
    parseNoLookup(buffer: Buffer): unknown[];
  };
}
