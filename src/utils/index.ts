export { parseDuration, parseOptionalDuration, formatDuration } from './duration-parser.js';
export { generateId } from './id-generator.js';
export { coerceToOperand, compareValues, clearMatchesCache, OPERATOR_SYMBOLS, type Operand } from './operators.js';
export { Signal } from './signal.js';
