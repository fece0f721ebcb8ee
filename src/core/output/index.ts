export {
  formatRows,
  isOutputFormat,
  type ObjectList,
  OUTPUT_FORMATS,
  type OutputFormat,
  toStructuredList,
} from './structured.js';
export { printTable, type TableOptions } from './table.js';
