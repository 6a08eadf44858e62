/**
 * Elasticsearch actions
 */

import { z } from "zod";
import { UnexpectedResponseError } from "../../errors.js";
import { encodeSegment, type RestClient } from "../../transport.js";
import {
  assertStatsParams,
  type CountParams,
  type CreateParams,
  type ElasticCommand,
  type SearchParams,
  type StatsParams,
  type UpdateParams,
} from "./schemas.js";

const AggregationResponseSchema = z
  .object({ aggregations: z.record(z.string(), z.unknown()).optional() })
  .passthrough();

/**
 * Encode an index expression. Commas separate several indices and stay literal.
 */
export function encodeIndex(index: string): string {
  return index
    .split(",")
    .map((part) => encodeSegment(part.trim()))
    .join(",");
}

export async function clusterHealth(client: RestClient): Promise<unknown> {
  return client.call("GET", "/_cluster/health");
}

export async function listIndices(client: RestClient, pattern?: string): Promise<unknown> {
  const path = pattern ? `/_cat/indices/${encodeIndex(pattern)}` : "/_cat/indices";
  return client.call("GET", path, { query: { format: "json" } });
}

export async function getMapping(client: RestClient, index: string): Promise<unknown> {
  return client.call("GET", `/${encodeIndex(index)}/_mapping`);
}

export function buildSearchBody(params: SearchParams): Record<string, unknown> {
  const body: Record<string, unknown> = {
    query: params.Query,
    size: params.Size,
    from: params.From,
  };
  if (params.Sort !== undefined) {
    body.sort = params.Sort;
  }
  if (params.Source !== undefined) {
    body._source = params.Source;
  }
  return body;
}

export async function searchDocuments(
  client: RestClient,
  index: string,
  params: SearchParams
): Promise<unknown> {
  return client.call("POST", `/${encodeIndex(index)}/_search`, { body: buildSearchBody(params) });
}

export async function countDocuments(
  client: RestClient,
  index: string,
  params: CountParams
): Promise<unknown> {
  return client.call("POST", `/${encodeIndex(index)}/_count`, { body: { query: params.Query } });
}

/**
 * Build a zero-hit query carrying the requested bucket aggregations.
 * Range and term filters are ANDed in a bool filter.
 */
export function buildStatsQuery(params: StatsParams): Record<string, unknown> {
  assertStatsParams(params);

  const filters: Record<string, unknown>[] = [];
  const rangeField = params.RangeField ?? params.DateField;
  if (rangeField && (params.Gte !== undefined || params.Lte !== undefined)) {
    filters.push({
      range: {
        [rangeField]: {
          ...(params.Gte !== undefined ? { gte: params.Gte } : {}),
          ...(params.Lte !== undefined ? { lte: params.Lte } : {}),
        },
      },
    });
  }
  for (const [field, value] of Object.entries(params.Terms ?? {})) {
    filters.push({ term: { [field]: value } });
  }

  const aggs: Record<string, unknown> = {};
  if (params.TermsField) {
    aggs.by_term = { terms: { field: params.TermsField, size: params.TermsSize } };
  }
  if (params.DateField) {
    aggs.over_time = {
      date_histogram: { field: params.DateField, calendar_interval: params.Interval },
    };
  }

  return {
    size: 0,
    query: filters.length > 0 ? { bool: { filter: filters } } : { match_all: {} },
    aggs,
  };
}

/**
 * Run the aggregation query and return the buckets exactly as the cluster sent them
 */
export async function aggregateStats(
  client: RestClient,
  index: string,
  params: StatsParams
): Promise<Record<string, unknown>> {
  const path = `/${encodeIndex(index)}/_search`;
  const raw = await client.call("POST", path, { body: buildStatsQuery(params) });
  const parsed = AggregationResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UnexpectedResponseError(`${client.baseUrl}${path}`, "expected a search response object");
  }
  return parsed.data.aggregations ?? {};
}

export async function getDocument(client: RestClient, index: string, id: string): Promise<unknown> {
  return client.call("GET", `/${encodeIndex(index)}/_doc/${encodeSegment(id)}`);
}

export async function createDocument(
  client: RestClient,
  index: string,
  params: CreateParams
): Promise<unknown> {
  if (params.Id !== undefined) {
    return client.call("PUT", `/${encodeIndex(index)}/_doc/${encodeSegment(params.Id)}`, {
      body: params.Document,
    });
  }
  return client.call("POST", `/${encodeIndex(index)}/_doc`, { body: params.Document });
}

/**
 * Partial update: the fields are merged into the stored document
 */
export async function updateDocument(
  client: RestClient,
  index: string,
  params: UpdateParams
): Promise<unknown> {
  return client.call("POST", `/${encodeIndex(index)}/_update/${encodeSegment(params.Id)}`, {
    body: { doc: params.Document },
  });
}

export async function deleteDocument(client: RestClient, index: string, id: string): Promise<unknown> {
  return client.call("DELETE", `/${encodeIndex(index)}/_doc/${encodeSegment(id)}`);
}

export async function executeElasticCommand(
  client: RestClient,
  command: ElasticCommand
): Promise<unknown> {
  switch (command.action) {
    case "health":
      return clusterHealth(client);
    case "indices":
      return listIndices(client, command.pattern);
    case "mapping":
      return getMapping(client, command.index);
    case "search":
      return searchDocuments(client, command.index, command.params);
    case "count":
      return countDocuments(client, command.index, command.params);
    case "stats":
      return aggregateStats(client, command.index, command.params);
    case "get":
      return getDocument(client, command.index, command.id);
    case "create":
      return createDocument(client, command.index, command.params);
    case "update":
      return updateDocument(client, command.index, command.params);
    case "delete":
      return deleteDocument(client, command.index, command.id);
  }
}
