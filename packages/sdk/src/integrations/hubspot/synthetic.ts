/**
 * Removal of auto-generated tenant records from CRM result pages
 */

import { z } from "zod";

/** Display names given to records created by tenant provisioning */
export const SYNTHETIC_NAME_PATTERN = /^auto-generated tenant\b/i;

export const CrmRecordSchema = z
  .object({
    id: z.string().optional(),
    properties: z.record(z.string(), z.unknown()).optional(),
  })
  .passthrough();

export const CrmPageSchema = z
  .object({
    results: z.array(CrmRecordSchema),
    total: z.number().optional(),
  })
  .passthrough();

export type CrmRecord = z.output<typeof CrmRecordSchema>;
export type CrmPage = z.output<typeof CrmPageSchema>;

export type FilteredPage = CrmPage & {
  results: CrmRecord[];
  /** Count after filtering */
  total: number;
  /** Total as reported by the service, before filtering */
  unfilteredTotal: number;
  syntheticRemoved: number;
};

export function isSyntheticRecord(record: CrmRecord, displayProperty: string): boolean {
  const name = record.properties?.[displayProperty];
  return typeof name === "string" && SYNTHETIC_NAME_PATTERN.test(name.trim());
}

export function filterSyntheticRecords(page: CrmPage, displayProperty: string): FilteredPage {
  const kept = page.results.filter((record) => !isSyntheticRecord(record, displayProperty));
  return {
    ...page,
    results: kept,
    total: kept.length,
    unfilteredTotal: page.total ?? page.results.length,
    syntheticRemoved: page.results.length - kept.length,
  };
}
