/**
 * Parser module: bank export bytes in, normalized records out.
 */

export { detectParser, extractAccountRef, getSupportedParsers } from './detect.js';
export type { ParserFn, ParserDetectionResult } from './detect.js';
export { parseOpBank } from './op-bank.js';
export { parseRecords } from './records.js';
