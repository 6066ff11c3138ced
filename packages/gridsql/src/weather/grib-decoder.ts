/**
 * GRIB2 decoding for gfs_forecast and read_grib
 *
 * vgrib2 splits a file into packets, one per message, with the data section
 * already unpacked. Packets are checked against the fields a point needs when
 * the file is opened, then walked in scanning order one bounded batch at a
 * time. Missing values are not produced.
 */

import { GRIB } from 'vgrib2';
import { z } from 'zod';
import { DecodeError, DecodeErrorCode } from '../errors/index.js';
import { normalizeLongitude } from './query-descriptor.js';
import type { GridDecoder } from './scan-cursor.js';

/**
 * A decoded grid point
 */
export interface GribPoint {
  latitude: number;
  /** Degrees east in [0, 360) */
  longitude: number;
  value: number;
  discipline: number;
  parameterCategory: number;
  parameterNumber: number;
  forecastTime: number;
  surfaceType: number;
  surfaceValue: number;
  /** messageNumber * 1000 + fieldNumber */
  messageIndex: number;
}

/**
 * Splits the bytes of one file into packets, one per message
 */
export type GribPacketParser = (bytes: Uint8Array) => unknown[];

export function parseGribPackets(bytes: Uint8Array): unknown[] {
  return GRIB.parseNoLookup(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength));
}

// =============================================================================
// Packet validation
// =============================================================================

const SCAN_NEGATIVE_I = 0x80;
const SCAN_POSITIVE_J = 0x40;
const SCAN_J_CONSECUTIVE = 0x20;
const SCAN_ALTERNATING = 0x10;

const MISSING_SCALE = 0xff;
const MISSING_SCALED_VALUE = 0xffffffff;

const GridSchema = z.object({
  nx: z.number().int().positive(),
  ny: z.number().int().positive(),
  la1: z.number(),
  lo1: z.number(),
  dx: z.number(),
  dy: z.number(),
  scanningMode: z
    .number()
    .int()
    .default(0)
    .refine((mode) => (mode & SCAN_ALTERNATING) === 0, (mode) => ({
      message: `0x${mode.toString(16)} is not supported`,
    })),
});

const ProductSchema = z.object({
  parameterCategory: z.number().int(),
  parameterNumber: z.number().int(),
  forecastTime: z.number().int().default(0),
  typeOfFirstFixedSurface: z.number().int().default(0),
  scaleFactorOfFirstFixedSurface: z.number().int().optional(),
  scaledValueOfFirstFixedSurface: z.number().optional(),
});

const PacketSchema = z
  .object({
    indicator: z.object({ discipline: z.number().int() }),
    gridDefinition: GridSchema,
    productDefinition: ProductSchema,
    data: z.array(z.union([z.number(), z.nan()]).nullish(), {
      invalid_type_error: 'is not an unpacked value list',
    }),
  })
  .superRefine((packet, ctx) => {
    const { nx, ny } = packet.gridDefinition;
    if (packet.data.length !== nx * ny) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['data'],
        message: `holds ${packet.data.length} values but the grid has ${nx * ny} points`,
      });
    }
  });

type GribPacket = z.infer<typeof PacketSchema>;
type ProductDefinition = z.infer<typeof ProductSchema>;

function validatePacket(raw: unknown, messageNumber: number): GribField {
  const result = PacketSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join('.')} ` : '';
    throw new DecodeError(DecodeErrorCode.OPEN_FAILED, `GRIB2 message ${messageNumber}: ${where}${issue.message}`, {
      context: { metadata: { message: messageNumber } },
    });
  }
  return toField(result.data, messageNumber);
}

// =============================================================================
// Fields
// =============================================================================

/** Everything a point of one message shares, plus where each value sits */
export interface GribField {
  template: Omit<GribPoint, 'latitude' | 'longitude' | 'value'>;
  values: GribPacket['data'];
  latitude(index: number): number;
  longitude(index: number): number;
}

function toField(packet: GribPacket, messageNumber: number): GribField {
  const { nx, ny, la1, lo1, dx, dy, scanningMode } = packet.gridDefinition;
  const product = packet.productDefinition;
  const iStep = scanningMode & SCAN_NEGATIVE_I ? -Math.abs(dx) : Math.abs(dx);
  const jStep = scanningMode & SCAN_POSITIVE_J ? Math.abs(dy) : -Math.abs(dy);
  const jConsecutive = (scanningMode & SCAN_J_CONSECUTIVE) !== 0;

  return {
    template: {
      discipline: packet.indicator.discipline,
      parameterCategory: product.parameterCategory,
      parameterNumber: product.parameterNumber,
      forecastTime: product.forecastTime,
      surfaceType: product.typeOfFirstFixedSurface,
      surfaceValue: surfaceValueOf(product),
      // vgrib2 yields one packet per message, so every field number is 0
      messageIndex: messageNumber * 1000,
    },
    values: packet.data,
    latitude(index) {
      const j = jConsecutive ? index % ny : Math.floor(index / nx);
      return roundMicro(la1 + j * jStep);
    },
    longitude(index) {
      const i = jConsecutive ? Math.floor(index / ny) : index % nx;
      return roundMicro(normalizeLongitude(lo1 + i * iStep));
    },
  };
}

function surfaceValueOf(product: ProductDefinition): number {
  const scale = product.scaleFactorOfFirstFixedSurface ?? 0;
  const scaled = product.scaledValueOfFirstFixedSurface;
  if (scaled === undefined || scale === MISSING_SCALE || scaled === MISSING_SCALED_VALUE) return 0;
  return scaled / 10 ** scale;
}

// Coordinates are coded in micro-degrees; drop the float noise of the sums
function roundMicro(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

// =============================================================================
// Decoder
// =============================================================================

/**
 * An opened file: its fields and the read position
 */
export interface GribFile {
  fields: GribField[];
  field: number;
  position: number;
}

/**
 * GRIB2 decoder used by gfs_forecast and read_grib
 */
export class Grib2GridDecoder implements GridDecoder<GribFile, GribPoint> {
  constructor(private readonly parse: GribPacketParser = parseGribPackets) {}

  open(bytes: Uint8Array): GribFile {
    const fields = this.parse(bytes).map((packet, index) => validatePacket(packet, index));
    return { fields, field: 0, position: 0 };
  }

  readBatch(file: GribFile, maxRows: number): { points: GribPoint[]; hasMore: boolean } {
    const points: GribPoint[] = [];

    while (points.length < maxRows && file.field < file.fields.length) {
      const field = file.fields[file.field];
      const { values } = field;

      while (points.length < maxRows && file.position < values.length) {
        const index = file.position++;
        const value = values[index];
        if (value === null || value === undefined || Number.isNaN(value)) continue;
        points.push({
          latitude: field.latitude(index),
          longitude: field.longitude(index),
          value,
          ...field.template,
        });
      }

      if (file.position >= values.length) {
        file.field++;
        file.position = 0;
      }
    }

    return { points, hasMore: file.field < file.fields.length };
  }

  close(file: GribFile): void {
    file.fields = [];
    file.field = 0;
    file.position = 0;
  }
}
