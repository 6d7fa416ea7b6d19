import { createHash } from 'node:crypto';

/**
 * SHA-256 of file content, prefixed with 'sha256:'.
 * Recorded in batch.json so a session can be traced to its input file.
 */
export function hashContent(content: Uint8Array): string {
    const hash = createHash('sha256').update(content).digest('hex');
    return `sha256:${hash}`;
}
