/**
 * Prism - Catalog Schema
 * Zod schemas for the YAML metrics catalog
 */

import { z } from 'zod';

import type { CatalogMetric, DataProduct } from './types.js';

const SensitiveFieldSchema = z.object({
  field: z.string().min(1),
  sensitivity: z.enum(['HIGH', 'MEDIUM', 'LOW']),
});

export const DataProductSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().default(''),
    version: z.coerce.string().default('unknown'),
    freshness: z.coerce.string().default('unknown'),
    grain: z.enum(['record', 'aggregate']).default('aggregate'),
    owner: z.string().optional(),
    dimensions: z.array(z.string()).default([]),
    metrics: z.array(z.string()).default([]),
    sensitive_fields: z.array(SensitiveFieldSchema).default([]),
    tests_passed: z.boolean().default(true),
  })
  .transform(
    ({ sensitive_fields, tests_passed, ...rest }): DataProduct => ({
      ...rest,
      sensitiveFields: sensitive_fields,
      testsPassed: tests_passed,
    })
  );

export const CatalogMetricSchema = z
  .object({
    id: z.string().min(1),
    description: z.string().default(''),
    data_product: z.string().default(''),
    unit: z.string().optional(),
  })
  .transform(({ data_product, ...rest }): CatalogMetric => ({ ...rest, dataProduct: data_product }));

export const CatalogFileSchema = z.object({
  data_products: z.array(DataProductSchema).default([]),
  metrics: z.array(CatalogMetricSchema).default([]),
});

export type CatalogFileInput = z.input<typeof CatalogFileSchema>;
export type CatalogFile = z.output<typeof CatalogFileSchema>;
