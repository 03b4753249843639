import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const __dirname = dirname(fileURLToPath(import.meta.url));

const countryTableSchema = z.record(z.string(), z.string().regex(/^[A-Z]{2}$/));

let byLowercaseName: Map<string, string> | undefined;

function loadTable(): Map<string, string> {
  if (!byLowercaseName) {
    const raw: unknown = JSON.parse(readFileSync(join(__dirname, 'data', 'country-codes.json'), 'utf-8'));
    const table = countryTableSchema.parse(raw);
    byLowercaseName = new Map(Object.entries(table).map(([name, code]) => [name.toLowerCase(), code]));
  }
  return byLowercaseName;
}

/** ISO 3166-1 alpha-2 code (lowercase) for an English country name, or undefined. */
export function countryNameToIso2(name: string): string | undefined {
  return loadTable().get(name.trim().toLowerCase())?.toLowerCase();
}
