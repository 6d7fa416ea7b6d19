/**
 * Text and file-format helpers for bank export parsers.
 */

/** Bytes handed to a parser. The caller reads the file; the core never does. */
export type ParserInput = ArrayBuffer | Uint8Array;

/**
 * Strip UTF-8 Byte Order Mark (BOM) from a string if present.
 * BOM (\uFEFF) can interfere with column header matching in CSVs.
 */
export function stripBom(value: string): string {
    if (value.startsWith('\uFEFF')) {
        return value.slice(1);
    }
    return value;
}

export function toBytes(data: ParserInput): Uint8Array {
    return data instanceof Uint8Array ? data : new Uint8Array(data);
}

/**
 * XLSX files are ZIP archives ("PK\x03\x04").
 */
export function isZipArchive(data: ParserInput): boolean {
    const bytes = toBytes(data);
    return bytes.length >= 4 && bytes[0] === 0x50 && bytes[1] === 0x4b && bytes[2] === 0x03 && bytes[3] === 0x04;
}

/**
 * Decode UTF-8 text, dropping a leading BOM.
 */
export function decodeText(data: ParserInput): string {
    return stripBom(new TextDecoder('utf-8').decode(toBytes(data)));
}

/**
 * Lowercase, trim and BOM-strip a header cell so columns match regardless
 * of how the bank capitalizes them.
 */
export function normalizeHeader(header: string): string {
    return stripBom(header).trim().toLowerCase();
}

/**
 * String value of a sheet cell; numbers and dates are left to dedicated parsers.
 */
export function cellString(value: unknown): string {
    if (value === null || value === undefined) return '';
    return String(value).trim();
}
