import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const COUNTRIES_FILE = fileURLToPath(new URL('../../data/countries.json', import.meta.url));

let table: Map<string, string> | null = null;

function countries(): Map<string, string> {
  if (!table) {
    const parsed = z.record(z.string()).parse(JSON.parse(readFileSync(COUNTRIES_FILE, 'utf8')));
    table = new Map(Object.entries(parsed).map(([code, name]) => [code.toLowerCase(), name]));
  }
  return table;
}

/** Display name for an ISO 3166-1 alpha-2 code; unknown codes come back upper-cased. */
export function countryName(code: string | null | undefined): string {
  if (!code) return 'Unknown';
  return countries().get(code.toLowerCase()) ?? code.toUpperCase();
}

export function normalizeCountryCode(code: unknown): string | null {
  if (typeof code !== 'string') return null;
  const trimmed = code.trim().toLowerCase();
  return /^[a-z]{2}$/.test(trimmed) ? trimmed : null;
}
