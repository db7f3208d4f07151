/**
 * Fingerprint types
 */

/** Normalized extension → number of files carrying it */
export type ExtensionHistogram = ReadonlyMap<string, number>;

/** Structural signature string (`d:`, `e:` or `u:` followed by hex) */
export type Signature = string;
