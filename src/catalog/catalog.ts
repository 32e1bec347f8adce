/**
 * Prism - Metrics Catalog
 *
 * YAML registry of data products and KPIs. Answers keyword metadata searches
 * and per-dataset quality lookups for evidence packs.
 */

import fs from 'fs';
import path from 'path';

import { parse as parseYaml } from 'yaml';

import logger from '../utils/logger.js';
import { toErrorMessage } from '../utils/helpers.js';
import { ConfigurationError } from '../utils/types.js';
import { CatalogFileSchema, type CatalogFile } from './schema.js';
import type { CatalogMetric, CatalogRecord, DataProduct, DatasetQuality } from './types.js';

export const DEFAULT_CATALOG_PATH = './data/metrics_catalog.yaml';

export class Catalog {
  private readonly dataProducts: readonly DataProduct[];
  private readonly metrics: readonly CatalogMetric[];

  constructor(file: CatalogFile) {
    this.dataProducts = Object.freeze([...file.data_products]);
    this.metrics = Object.freeze([...file.metrics]);
  }

  /**
   * Read and validate a catalog file
   */
  static load(catalogPath: string = DEFAULT_CATALOG_PATH): Catalog {
    const resolved = path.resolve(catalogPath);

    let raw: unknown;
    try {
      raw = parseYaml(fs.readFileSync(resolved, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(`Failed to read catalog ${resolved}: ${toErrorMessage(error)}`);
    }

    const catalog = Catalog.fromObject(raw ?? {});
    logger.debug('Catalog loaded', {
      path: resolved,
      dataProducts: catalog.dataProducts.length,
      metrics: catalog.metrics.length,
    });
    return catalog;
  }

  /**
   * Build a catalog from an already-parsed document
   */
  static fromObject(raw: unknown): Catalog {
    const result = CatalogFileSchema.safeParse(raw);
    if (!result.success) {
      const details = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
      throw new ConfigurationError(`Invalid catalog: ${details.join('; ')}`);
    }
    return new Catalog(result.data);
  }

  getDataProducts(): readonly DataProduct[] {
    return this.dataProducts;
  }

  getMetrics(): readonly CatalogMetric[] {
    return this.metrics;
  }

  /**
   * Keyword search: a record matches when any whitespace-separated token of
   * the query occurs in its searchable text. Data products come first.
   */
  search(query: string): CatalogRecord[] {
    const tokens = query.toLowerCase().split(/\s+/).filter((t) => t.length > 0);
    if (tokens.length === 0) return [];

    const matches = (text: string): boolean => {
      const haystack = text.toLowerCase();
      return tokens.some((t) => haystack.includes(t));
    };

    const results: CatalogRecord[] = [];
    for (const dp of this.dataProducts) {
      const text = [dp.name, dp.description, dp.dimensions.join(' '), dp.metrics.join(' ')].join(' ');
      if (matches(text)) {
        results.push({ kind: 'data_product', ...dp });
      }
    }
    for (const metric of this.metrics) {
      if (matches([metric.id, metric.description, metric.dataProduct].join(' '))) {
        results.push({ kind: 'metric', ...metric });
      }
    }
    return results;
  }

  /**
   * Freshness and test status for the named datasets, in catalog order
   */
  quality(datasetNames: readonly string[]): DatasetQuality[] {
    const wanted = new Set(datasetNames);
    return this.dataProducts
      .filter((dp) => wanted.has(dp.name))
      .map((dp) => ({
        dataset: dp.name,
        version: dp.version,
        freshness: dp.freshness,
        testsPassed: dp.testsPassed,
      }));
  }
}

/**
 * Distinct data-product names among search hits, first seen first
 */
export function datasetNames(records: readonly CatalogRecord[]): string[] {
  const names: string[] = [];
  for (const record of records) {
    if (record.kind === 'data_product' && !names.includes(record.name)) {
      names.push(record.name);
    }
  }
  return names;
}
