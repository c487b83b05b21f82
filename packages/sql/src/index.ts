// Main entry point
export { SqlStatementGenerator, DEFAULT_BATCH_SIZE } from './SqlStatementGenerator.js';
export type { SqlStatementGeneratorConfig, GeneratedStatement } from './SqlStatementGenerator.js';

// Formatting helpers
export {
  TABLE_NAME,
  COLUMNS,
  escapeSqlString,
  formatTimestamp,
  formatConsumption,
  formatValueTuple,
  buildInsertStatement,
} from './formatting.js';
