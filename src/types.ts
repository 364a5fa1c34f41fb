export type TableRow = readonly string[];

export type MappingKey = string | number | bigint | boolean;

export type MappingValue = string | number | bigint | boolean;

export type TableMapping =
  | ReadonlyMap<MappingKey, MappingValue>
  | Readonly<Record<string, MappingValue>>;

export type TableRows = readonly TableRow[] | TableMapping;
