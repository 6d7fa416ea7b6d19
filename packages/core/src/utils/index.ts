export { stripBom, toBytes, isZipArchive, decodeText, normalizeHeader, cellString } from './csv.js';
export type { ParserInput } from './csv.js';
export {
    parseDateValue,
    parseDmyDate,
    parseIsoDate,
    excelSerialToDate,
    formatIsoDate,
    isValidDate,
} from './date-parse.js';
export type { DateFormat } from './date-parse.js';
export { parseAmount, toMinorUnits, formatMinorUnits } from './amount.js';
export type { DecimalStyle } from './amount.js';
