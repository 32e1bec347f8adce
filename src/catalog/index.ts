/**
 * Prism - Catalog Module
 */

export { Catalog, datasetNames, DEFAULT_CATALOG_PATH } from './catalog.js';
export { CatalogFileSchema, DataProductSchema, CatalogMetricSchema } from './schema.js';
export type { CatalogFile, CatalogFileInput } from './schema.js';
export type { DataProduct, CatalogMetric, CatalogRecord, DatasetQuality } from './types.js';
