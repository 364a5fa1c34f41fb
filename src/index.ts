export {
  EXTERNAL_FAILURE_NOTE,
  ExternalFailure,
  KeyNotFoundError,
} from "./errors";
export { fmt_table, type FmtTableOptions } from "./table";
export {
  TypePartitionedMap,
  typeOfKey,
  type KeyType,
  type PartitionSource,
} from "./typePartitionedMap";
export type {
  MappingKey,
  MappingValue,
  TableMapping,
  TableRow,
  TableRows,
} from "./types";
export { clamp_idx, combinations, powerset, range } from "./utils";
