/**
 * Locality normalization
 *
 * One comparison key per city: diacritics folded, case and punctuation
 * dropped, locale variants collapsed through the alias table.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const CityAliasTableSchema = z.record(z.string(), z.array(z.string()));

function loadAliasTable(): Map<string, string> {
  const path = fileURLToPath(new URL('./city-aliases.json', import.meta.url));
  const table = CityAliasTableSchema.parse(JSON.parse(readFileSync(path, 'utf8')));

  const byKey = new Map<string, string>();
  for (const [canonical, variants] of Object.entries(table)) {
    byKey.set(foldLocality(canonical), canonical);
    for (const variant of variants) {
      byKey.set(foldLocality(variant), canonical);
    }
  }
  return byKey;
}

/**
 * Fold a name to a bare comparison form: "São Paulo " -> "sao paulo"
 */
export function foldLocality(value: string): string {
  return value
    .normalize('NFKD')
    .replace(/\p{M}/gu, '')
    .replace(/ß/g, 'ss')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

let aliasTable: Map<string, string> | null = null;

function aliases(): Map<string, string> {
  if (!aliasTable) {
    aliasTable = loadAliasTable();
  }
  return aliasTable;
}

/**
 * Canonical display name for a city. Unknown names are trimmed and
 * whitespace-collapsed but otherwise kept as given.
 */
export function canonicalLocality(value: string): string {
  const known = aliases().get(foldLocality(value));
  if (known) return known;
  return value.trim().replace(/\s+/g, ' ');
}

/**
 * Comparison key; equal keys mean the same city
 */
export function localityKey(value: string): string {
  return foldLocality(canonicalLocality(value));
}

export function isSameLocality(a: string, b: string): boolean {
  const keyA = localityKey(a);
  return keyA.length > 0 && keyA === localityKey(b);
}

/**
 * Levenshtein distance (two-row)
 */
export function editDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let prev = Array.from({ length: b.length + 1 }, (_, i) => i);
  let curr = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    curr[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(
        (prev[j] ?? 0) + 1,
        (curr[j - 1] ?? 0) + 1,
        (prev[j - 1] ?? 0) + cost
      );
    }
    [prev, curr] = [curr, prev];
  }

  return prev[b.length] ?? 0;
}

/**
 * Transliteration allowance: one edit per five characters of the target key
 * ("Krakow"/"Krakov" pass, "Munich"/"Zurich" do not).
 */
function isNearSpelling(targetKey: string, candidateKey: string): boolean {
  const allowed = Math.floor(targetKey.length / 5);
  if (allowed === 0) return false;
  return editDistance(targetKey, candidateKey) <= allowed;
}

/**
 * Does a places-service result belong to the target city?
 *
 * A reported locality decides on its own, under alias normalization and the
 * near-spelling allowance. Only without one is the formatted address checked
 * (whole-key substring, then per comma-separated part); street names such as
 * "London Road" never count against a reported locality.
 */
export function isLocalityMatch(targetCity: string, locality: string | null, address: string): boolean {
  const targetKey = localityKey(targetCity);
  if (!targetKey) return false;

  if (locality?.trim()) {
    const candidateKey = localityKey(locality);
    return candidateKey === targetKey || isNearSpelling(targetKey, candidateKey);
  }

  const addressKey = ` ${foldLocality(address)} `;
  if (addressKey.includes(` ${targetKey} `)) {
    return true;
  }

  for (const part of address.split(',')) {
    // Postal codes ride along with the city name ("80331 München")
    const stripped = part.replace(/\b[\p{N}-]+\b/gu, ' ');
    const partKey = localityKey(stripped);
    if (!partKey) continue;
    if (partKey === targetKey || isNearSpelling(targetKey, partKey)) {
      return true;
    }
  }

  return false;
}
