import { readFileSync } from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';

export const citySchema = z.object({
  name: z.string().min(1),
  country: z.string().min(1),
  region: z.string().min(1),
  continent: z.string().min(1),
  tags: z.array(z.string().min(1)).default([]),
});

export type City = z.infer<typeof citySchema>;

export const catalogFileSchema = z
  .object({
    version: z.number().int().positive().default(1),
    cities: z.array(citySchema).min(1),
  })
  .superRefine((catalog, ctx) => {
    const seen = new Set<string>();
    catalog.cities.forEach((city, index) => {
      const key = city.name.toLowerCase();
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['cities', index, 'name'],
          message: `Duplicate city '${city.name}'`,
        });
      }
      seen.add(key);
    });
  });

export type CatalogFile = z.infer<typeof catalogFileSchema>;

export class CatalogSchemaError extends Error {
  constructor(public readonly filePath: string, message: string) {
    super(`Invalid destination catalog schema in ${filePath}: ${message}`);
    this.name = 'CatalogSchemaError';
  }
}

export class CatalogIoError extends Error {
  constructor(public readonly filePath: string, cause: unknown) {
    super(`Failed to read destination catalog file ${filePath}`);
    this.name = 'CatalogIoError';
    this.cause = cause;
  }

  declare cause: unknown;
}

export const defaultCatalogPath = path.join(__dirname, '..', 'catalog', 'destinations.yaml');

export function parseCatalogYaml(rawYaml: string, filePath = 'destinations.yaml'): CatalogFile {
  const parsed = YAML.parse(rawYaml);
  const result = catalogFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new CatalogSchemaError(filePath, result.error.message);
  }
  return result.data;
}

export function loadCatalog(filePath = defaultCatalogPath): TravelCatalog {
  let rawYaml: string;

  try {
    rawYaml = readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new CatalogIoError(filePath, error);
  }

  return new TravelCatalog(parseCatalogYaml(rawYaml, filePath).cities);
}

export interface CityQuery {
  region?: string;
  tags?: ReadonlyArray<string>;
  exclude?: ReadonlyArray<string>;
}

/** Read-only lookup over catalog cities; names match case-insensitively, results keep file order. */
export class TravelCatalog {
  private readonly byName: Map<string, City>;

  constructor(readonly cities: ReadonlyArray<City>) {
    this.byName = new Map(cities.map((city) => [city.name.toLowerCase(), city]));
  }

  find(name: string): City | undefined {
    return this.byName.get(name.trim().toLowerCase());
  }

  regions(): string[] {
    return [...new Set(this.cities.map((city) => city.region))];
  }

  query(query: CityQuery = {}): City[] {
    const excluded = new Set((query.exclude ?? []).map((name) => name.trim().toLowerCase()));
    const region = query.region?.toLowerCase();
    const tags = query.tags ?? [];

    return this.cities.filter(
      (city) =>
        !excluded.has(city.name.toLowerCase()) &&
        (region === undefined || city.region.toLowerCase() === region) &&
        tags.every((tag) => city.tags.includes(tag)),
    );
  }
}
