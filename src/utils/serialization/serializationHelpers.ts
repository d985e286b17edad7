// src/utils/serialization/serializationHelpers.ts

/**
 * Serializes a 32-bit unsigned integer into a big-endian Uint8Array.
 *
 * @param value - The 32-bit unsigned integer to serialize.
 * @returns A 4-byte array holding the value.
 */
export function serializeUInt32(value: number): Uint8Array {
    const buffer = new Uint8Array(4);
    const view = new DataView(buffer.buffer);
    view.setUint32(0, value, false); // false for Big Endian
    return buffer;
}

/**
 * Deserializes a big-endian 32-bit unsigned integer from the given Uint8Array at the specified offset.
 * Throws a RangeError when fewer than 4 bytes follow the offset.
 *
 * @param buffer - The Uint8Array containing the serialized integer.
 * @param offset - Where the integer starts.
 * @return The deserialized value and the offset just past it.
 */
export function deserializeUInt32(buffer: Uint8Array, offset: number): { value: number; newOffset: number } {
    const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    const value = view.getUint32(offset, false); // false for Big Endian
    return { value, newOffset: offset + 4 };
}
