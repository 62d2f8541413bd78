/** Collections exposed through the HTTP surface, in listing order. */
export const ENTITY_COLLECTIONS = ['site', 'asset', 'job', 'invoice', 'feedback'] as const;

export type EntityCollection = (typeof ENTITY_COLLECTIONS)[number];
