// src/utils/misc/uint8arrayHelpers.ts

/**
 * Compares two Uint8Array objects for equality.
 *
 * This function returns true if both arrays have the same length and identical elements at each index.
 *
 * @param arr1 - The first array to compare.
 * @param arr2 - The second array to compare.
 * @return Whether the arrays hold the same bytes.
 */
export function compareUint8ArraysQuick(arr1: Uint8Array, arr2: Uint8Array): boolean {
    return arr1.length === arr2.length && arr1.every((value, index) => value === arr2[index]);
}

/**
 * Concatenates multiple Uint8Array objects into a single Uint8Array.
 *
 * @param arrays - The arrays to concatenate, in order.
 * @return A new Uint8Array containing all the elements from the input arrays.
 */
export function concatUint8Arrays(arrays: Uint8Array[]): Uint8Array {
    const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
    const result = new Uint8Array(totalLength);

    let offset = 0;
    for (const arr of arrays) {
        result.set(arr, offset);
        offset += arr.length;
    }

    return result;
}
