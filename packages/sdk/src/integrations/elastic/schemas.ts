/**
 * Elasticsearch action catalog and parameter decoding
 */

import { z } from "zod";
import {
  findAction,
  requirePrimaryKey,
  type ActionDefinition,
  type ServiceConfig,
} from "../../actions.js";
import { MissingParameterError, UnsupportedActionError } from "../../errors.js";
import {
  asText,
  decodeParameters,
  IdSchema,
  ObjectSchema,
  PageSizeSchema,
  type ParameterBag,
} from "../../params.js";

export const ELASTIC_SERVICE: ServiceConfig = {
  name: "Elasticsearch",
  baseUrlEnv: "ES_BASE_URL",
  defaultBaseUrl: "http://localhost:9200",
  credentials: {
    kind: "basic",
    service: "Elasticsearch",
    principalEnv: "ES_USERNAME",
    secretEnv: "ES_PASSWORD",
  },
};

export const ELASTIC_KEY_LABEL = "index";

export const DEFAULT_SEARCH_SIZE = 100;

const NoParamsSchema = z.object({});

export const SearchParamsSchema = z.object({
  Query: ObjectSchema.default(() => ({ match_all: {} })),
  Size: PageSizeSchema.default(DEFAULT_SEARCH_SIZE),
  From: PageSizeSchema.default(0),
  Sort: z.unknown().optional(),
  Source: z.unknown().optional(),
});

export const CountParamsSchema = z.object({
  Query: ObjectSchema.default(() => ({ match_all: {} })),
});

const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]);

export const StatsParamsSchema = z.object({
  TermsField: asText(z.string().min(1)).optional(),
  TermsSize: PageSizeSchema.default(10),
  DateField: asText(z.string().min(1)).optional(),
  Interval: asText(z.string().min(1)).default("day"),
  RangeField: asText(z.string().min(1)).optional(),
  Gte: z.union([z.string(), z.number()]).optional(),
  Lte: z.union([z.string(), z.number()]).optional(),
  Terms: z.record(z.string(), ScalarSchema).optional(),
});

export const DocumentIdParamsSchema = z.object({
  Id: IdSchema,
});

export const CreateParamsSchema = z.object({
  Document: ObjectSchema,
  Id: IdSchema.optional(),
});

export const UpdateParamsSchema = z.object({
  Id: IdSchema,
  Document: ObjectSchema,
});

export type SearchParams = z.output<typeof SearchParamsSchema>;
export type CountParams = z.output<typeof CountParamsSchema>;
export type StatsParams = z.output<typeof StatsParamsSchema>;
export type CreateParams = z.output<typeof CreateParamsSchema>;
export type UpdateParams = z.output<typeof UpdateParamsSchema>;

export const ELASTIC_ACTIONS: readonly ActionDefinition[] = [
  { name: "health", summary: "Cluster health", key: "none", schema: NoParamsSchema },
  {
    name: "indices",
    summary: "List indices, optionally matching a pattern",
    key: "optional",
    schema: NoParamsSchema,
  },
  { name: "mapping", summary: "Show the field mapping of an index", key: "required", schema: NoParamsSchema },
  {
    name: "search",
    summary: `Search documents (Size defaults to ${DEFAULT_SEARCH_SIZE}, From to 0)`,
    key: "required",
    schema: SearchParamsSchema,
  },
  { name: "count", summary: "Count documents matching a query", key: "required", schema: CountParamsSchema },
  {
    name: "stats",
    summary: "Bucketed aggregations (terms, calendar-interval date histogram)",
    key: "required",
    schema: StatsParamsSchema,
    notes: "needs TermsField or DateField; Gte/Lte filter on RangeField (or DateField)",
  },
  { name: "get", summary: "Fetch a document by id", key: "required", schema: DocumentIdParamsSchema },
  {
    name: "create",
    summary: "Index a new document (with Id: create or replace that id)",
    key: "required",
    schema: CreateParamsSchema,
  },
  {
    name: "update",
    summary: "Partially update a document",
    key: "required",
    schema: UpdateParamsSchema,
  },
  { name: "delete", summary: "Delete a document", key: "required", schema: DocumentIdParamsSchema },
];

export type ElasticCommand =
  | { action: "health" }
  | { action: "indices"; pattern?: string }
  | { action: "mapping"; index: string }
  | { action: "search"; index: string; params: SearchParams }
  | { action: "count"; index: string; params: CountParams }
  | { action: "stats"; index: string; params: StatsParams }
  | { action: "get"; index: string; id: string }
  | { action: "create"; index: string; params: CreateParams }
  | { action: "update"; index: string; params: UpdateParams }
  | { action: "delete"; index: string; id: string };

/**
 * Reject aggregation requests that would produce no buckets
 */
export function assertStatsParams(params: StatsParams): void {
  if (!params.TermsField && !params.DateField) {
    throw new MissingParameterError("TermsField or DateField", "stats");
  }
  const ranged = params.Gte !== undefined || params.Lte !== undefined;
  if (ranged && !params.RangeField && !params.DateField) {
    throw new MissingParameterError("RangeField", "stats");
  }
}

/**
 * Decode an action name, index and parameter bag into a typed command
 */
export function decodeElasticCommand(
  action: string,
  index: string | undefined,
  bag: ParameterBag
): ElasticCommand {
  const definition = findAction(ELASTIC_ACTIONS, action);
  const key = (): string => requirePrimaryKey(definition, index, ELASTIC_KEY_LABEL);

  switch (definition.name) {
    case "health":
      return { action: "health" };
    case "indices": {
      const pattern = index?.trim();
      return pattern ? { action: "indices", pattern } : { action: "indices" };
    }
    case "mapping":
      return { action: "mapping", index: key() };
    case "search":
      return { action: "search", index: key(), params: decodeParameters(SearchParamsSchema, bag, "search") };
    case "count":
      return { action: "count", index: key(), params: decodeParameters(CountParamsSchema, bag, "count") };
    case "stats": {
      const target = key();
      const params = decodeParameters(StatsParamsSchema, bag, "stats");
      assertStatsParams(params);
      return { action: "stats", index: target, params };
    }
    case "get":
      return { action: "get", index: key(), id: decodeParameters(DocumentIdParamsSchema, bag, "get").Id };
    case "create":
      return { action: "create", index: key(), params: decodeParameters(CreateParamsSchema, bag, "create") };
    case "update":
      return { action: "update", index: key(), params: decodeParameters(UpdateParamsSchema, bag, "update") };
    case "delete":
      return {
        action: "delete",
        index: key(),
        id: decodeParameters(DocumentIdParamsSchema, bag, "delete").Id,
      };
    default:
      throw new UnsupportedActionError(
        action,
        ELASTIC_ACTIONS.map((entry) => entry.name)
      );
  }
}
