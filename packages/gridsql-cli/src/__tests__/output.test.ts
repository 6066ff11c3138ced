import { describe, it, expect } from 'vitest';
import { createRowWriter, csvField } from '../utils/output.js';

describe('row output', () => {
  it('should quote CSV fields only when needed', () => {
    expect(csvField('2m')).toBe('2m');
    expect(csvField('a,b')).toBe('"a,b"');
    expect(csvField('say "hi"')).toBe('"say ""hi"""');
    expect(csvField(null)).toBe('');
    expect(csvField(new Date('2024-01-15T06:00:00Z'))).toBe('2024-01-15T06:00:00.000Z');
    expect(csvField(Uint8Array.of(1, 255))).toBe('01ff');
  });

  it('should write CSV rows in column order', () => {
    const lines: string[] = [];
    const writer = createRowWriter('csv', (line) => lines.push(line));

    writer.begin(['value', 'level']);
    writer.write({ level: 'surface', value: 1.5 });
    writer.write({ level: null, value: 2 });

    expect(lines).toEqual(['value,level', '1.5,surface', '2,']);
  });

  it('should write one JSON document per row', () => {
    const lines: string[] = [];
    const writer = createRowWriter('ndjson', (line) => lines.push(line));

    writer.begin(['time', 'count', 'raw']);
    writer.write({ time: new Date('2024-01-15T06:00:00Z'), count: 12n, raw: Uint8Array.of(10) });

    expect(lines).toEqual(['{"time":"2024-01-15T06:00:00.000Z","count":"12","raw":"0a"}']);
  });
});
