// src/utils/storage/storageUtils.ts

import fs from 'node:fs';
import path from 'node:path';

/**
 * Reads the entire contents of a file.
 *
 * @param filePath - The file to read.
 * @returns The file contents as a Uint8Array.
 */
export function readBufferFromFile(filePath: string): Uint8Array {
    const data = fs.readFileSync(filePath);
    return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
}

/**
 * Writes a buffer to a file, creating missing parent directories.
 *
 * @param filePath - Destination path; an existing file is replaced.
 * @param data - The bytes to write.
 */
export function writeBufferToFile(filePath: string, data: Uint8Array): void {
    ensureOutputDirectory(path.dirname(filePath));
    fs.writeFileSync(filePath, data);
}

/**
 * Ensures that the specified output directory exists, creating it and any necessary parents.
 */
export function ensureOutputDirectory(outputFolder: string): void {
    fs.mkdirSync(outputFolder, { recursive: true });
}

/**
 * Checks if a file or directory exists at the given file path.
 *
 * @return true if something exists there; errors other than "not found" are rethrown.
 */
export function filePathExists(filePath: string): boolean {
    try {
        fs.statSync(filePath);
        return true;
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            return false;
        }
        throw error; // Re-throw if it's a different error
    }
}
