/**
 * Round to a fixed number of decimal places.
 */
export function roundTo(value: number, decimals: number): number {
    const factor = 10 ** decimals;
    return Math.round(value * factor) / factor;
}
