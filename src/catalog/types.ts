/**
 * Prism - Catalog Types
 */

import type { RequestedField } from '../policy/types.js';
import type { TableGrain } from '../dsl/registry.js';

export interface DataProduct {
  name: string;
  description: string;
  version: string;
  freshness: string;
  grain: TableGrain;
  owner?: string;
  dimensions: string[];
  metrics: string[];
  sensitiveFields: RequestedField[];
  testsPassed: boolean;
}

export interface CatalogMetric {
  id: string;
  description: string;
  dataProduct: string;
  unit?: string;
}

/**
 * Metadata search hit. Only data products carry a dataset name.
 */
export type CatalogRecord =
  | ({ kind: 'data_product' } & DataProduct)
  | ({ kind: 'metric' } & CatalogMetric);

export interface DatasetQuality {
  dataset: string;
  version: string;
  freshness: string;
  testsPassed: boolean;
}
