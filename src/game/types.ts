declare const brandKey: unique symbol;
type Brand<B> = {[brandKey]: B};
export type Branded<T, B> = T & Brand<B>;

/**
 * The flat string representation of a grid: a row-major list of each
 * location, with either the numeral in the location or a period meaning the
 * location is empty.
 */
export type GridString = Branded<string, 'Grid'>;

/** A numeral or blank for each of the 81 locations, in row-major order. */
export type GridValues = ReadonlyArray<number | null>;
