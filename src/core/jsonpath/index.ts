export { evaluatePath, getNestedString } from './evaluator.js';
export { parsePath } from './parser.js';
export type { FilterLiteral, FilterOperator, ParsedPath, PathSegment } from './types.js';
