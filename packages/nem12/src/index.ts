// Main entry point
export { Nem12Parser } from './Nem12Parser.js';

// Record-level building blocks
export { RecordType } from './domain/RecordType.js';
export type { ParserState } from './domain/ParserState.js';
export { parseContextRecord } from './domain/records/parseContextRecord.js';
export {
  expandIntervalRecord,
  parseIntervalDate,
  parseConsumption,
  consumptionScale,
} from './domain/records/parseIntervalRecord.js';
export { splitFields } from './infrastructure/splitFields.js';
