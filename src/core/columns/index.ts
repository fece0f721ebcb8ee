export { CELL_INVALID, CELL_UNKNOWN, humanDuration, translateTimestampSince } from './age.js';
export { OBJECT_COLUMN_DEFINITIONS } from './definitions.js';
export {
  CELL_UNSET,
  type ColumnOptions,
  conditionPath,
  DEFAULT_CONDITION_TYPE,
  getDisplayName,
  getObjectColumns,
} from './extractor.js';
