/**
 * An upstream record before validation. The Metlink Open Data API deviates
 * from its documented schemas (ids arrive as numbers or strings, fields go
 * missing), so records stay loosely typed until `metlink/parsers.ts` has
 * checked them field by field.
 */
export type UpstreamRecord = Record<string, unknown>;
