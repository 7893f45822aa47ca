/**
 * Clock Port
 */

/** Current time as whole Unix seconds */
export type Clock = () => number;
