/** Value of a whole dataref as exposed to applications. */
export type DatarefValue = number | string | number[];

/** Value accepted for writing. Arrays are written whole, elements one at a time. */
export type WritableValue = number | string | number[];
