import fs from 'node:fs';
import { z } from 'zod';
import { DiscoveryError } from '../errors.js';
import type { CsvRow } from '../types.js';

export const DEFAULT_VERTICALS_PATH = 'data/verticals.json';

export const SIZE_NAMES = ['small', 'mid', 'large'] as const;
export type SizeName = (typeof SIZE_NAMES)[number];

const RangeSchema = z.tuple([z.number().int().min(1), z.number().int().min(1)]);

const DatasetSchema = z.object({
  sizes: z.object({ small: RangeSchema, mid: RangeSchema, large: RangeSchema }),
  verticals: z.record(
    z.object({
      keywords: z.array(z.string().min(1)).min(1),
      companies: z.array(z.object({ company_name: z.string(), website: z.string().min(1) })),
    }),
  ),
});

export interface SeedCompany {
  readonly company_name: string;
  readonly website: string;
}

export interface Vertical {
  readonly name: string;
  /** Search terms sent to the enrichment API. */
  readonly keywords: readonly string[];
  readonly companies: readonly SeedCompany[];
}

/** Loaded once at start-up and shared read-only for the rest of the run. */
export interface VerticalsDataset {
  readonly sizes: Readonly<Record<SizeName, readonly [number, number]>>;
  readonly verticals: ReadonlyMap<string, Vertical>;
}

/**
 * Read and validate the bundled verticals file. Every object in the result
 * is frozen.
 *
 * @throws ZodError when the file does not have the expected shape.
 */
export function loadVerticals(filePath = DEFAULT_VERTICALS_PATH): VerticalsDataset {
  return parseVerticals(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
}

export function parseVerticals(raw: unknown): VerticalsDataset {
  const data = DatasetSchema.parse(raw);
  const verticals = new Map<string, Vertical>();
  for (const [name, v] of Object.entries(data.verticals)) {
    verticals.set(name, Object.freeze({
      name,
      keywords: Object.freeze([...v.keywords]),
      companies: Object.freeze(v.companies.map((c) => Object.freeze({ ...c }))),
    }));
  }
  const sizes = Object.freeze({
    small: Object.freeze(data.sizes.small),
    mid: Object.freeze(data.sizes.mid),
    large: Object.freeze(data.sizes.large),
  });
  return Object.freeze({ sizes, verticals: new ReadonlyVerticals(verticals) });
}

/** A Map whose mutators throw, so the dataset cannot change after loading. */
class ReadonlyVerticals extends Map<string, Vertical> {
  private sealed = false;

  constructor(entries: Map<string, Vertical>) {
    super(entries);
    this.sealed = true;
  }

  override set(key: string, value: Vertical): this {
    if (this.sealed) throw new TypeError('verticals dataset is read-only');
    return super.set(key, value);
  }

  override delete(): boolean {
    throw new TypeError('verticals dataset is read-only');
  }

  override clear(): void {
    throw new TypeError('verticals dataset is read-only');
  }
}

export function getVertical(dataset: VerticalsDataset, name: string): Vertical {
  const v = dataset.verticals.get(name);
  if (!v) {
    throw new DiscoveryError('unknown_vertical', `Unknown vertical "${name}". Known: ${[...dataset.verticals.keys()].join(', ')}`);
  }
  return v;
}

/** The bundled seed companies of a vertical, capped at `limit`. */
export function sampleCompanies(dataset: VerticalsDataset, vertical: string, limit: number): CsvRow[] {
  return getVertical(dataset, vertical)
    .companies.slice(0, Math.max(0, limit))
    .map((c) => ({ company_name: c.company_name, website: c.website, vertical }));
}
