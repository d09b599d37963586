import table from './mapper_names.json';

export const UNKNOWN_MAPPER = 'Unknown/Custom';

const NAMES: ReadonlyMap<number, string> = new Map(
  Object.entries(table).map(([k, v]): [number, string] => [Number(k), v]),
);

/** Board name for a mapper number; unlisted numbers get `UNKNOWN_MAPPER`. */
export function mapperName(mapper: number): string {
  return NAMES.get(mapper) ?? UNKNOWN_MAPPER;
}

export const knownMappers = (): number[] => [...NAMES.keys()].sort((a, b) => a - b);
