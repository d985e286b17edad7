// src/utils/checksum/crc.ts

import { Buffer } from 'node:buffer';
import { crc32 } from 'crc';

/**
 * CRC-32 (ISO-HDLC, the PNG checksum) over the chunk type bytes followed by the chunk data.
 */
export function computeChunkCrc(typeBytes: Uint8Array, data: Uint8Array): number {
    return crc32(Buffer.concat([typeBytes, data])) >>> 0;
}
