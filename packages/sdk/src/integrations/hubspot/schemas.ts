/**
 * HubSpot CRM action catalog and two-level (action, object type) decoding
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
  FlagSchema,
  IdSchema,
  NameListSchema,
  ObjectSchema,
  PageSizeSchema,
  type ParameterBag,
} from "../../params.js";
import { resolveObjectType, type ObjectTypeDefinition } from "./object-types.js";

export const HUBSPOT_SERVICE: ServiceConfig = {
  name: "HubSpot",
  baseUrlEnv: "HUBSPOT_BASE_URL",
  defaultBaseUrl: "https://api.hubapi.com",
  credentials: { kind: "token", service: "HubSpot", tokenEnv: "HUBSPOT_ACCESS_TOKEN" },
};

export const HUBSPOT_KEY_LABEL = "objectType";

export const DEFAULT_PAGE_LIMIT = 100;

const NoParamsSchema = z.object({});

const CursorSchema = z.union([z.string().min(1), z.number().int().min(0)]);

export const GetParamsSchema = z.object({
  Id: IdSchema.optional(),
  Email: asText(z.string().trim().min(1)).optional(),
  Domain: asText(z.string().trim().min(1)).optional(),
  Fields: NameListSchema.optional(),
});

export const ListParamsSchema = z.object({
  Limit: PageSizeSchema.default(DEFAULT_PAGE_LIMIT),
  After: CursorSchema.optional(),
  Fields: NameListSchema.optional(),
  IncludeSynthetic: FlagSchema.default(false),
});

const FilterSchema = z
  .object({
    propertyName: z.string().min(1),
    operator: z.string().min(1),
    value: z.unknown().optional(),
  })
  .passthrough();

export const SearchParamsSchema = z.object({
  Query: asText(z.string().min(1)).optional(),
  Filters: z.array(FilterSchema).optional(),
  Sorts: z.array(z.unknown()).optional(),
  Limit: PageSizeSchema.default(DEFAULT_PAGE_LIMIT),
  After: CursorSchema.default(0),
  Fields: NameListSchema.optional(),
  IncludeSynthetic: FlagSchema.default(false),
});

export const CreateParamsSchema = z.object({
  Properties: ObjectSchema,
});

export const UpdateParamsSchema = z.object({
  Id: IdSchema,
  Properties: ObjectSchema,
});

export const DeleteParamsSchema = z.object({
  Id: IdSchema,
});

export const AssociateParamsSchema = z.object({
  Id: IdSchema,
  ToType: asText(z.string().min(1)),
  ToId: IdSchema,
});

export type ListParams = z.output<typeof ListParamsSchema>;
export type SearchParams = z.output<typeof SearchParamsSchema>;

export const HUBSPOT_ACTIONS: readonly ActionDefinition[] = [
  { name: "owners", summary: "List CRM owners", key: "none", schema: NoParamsSchema },
  { name: "properties", summary: "Property definitions of an object type", key: "required", schema: NoParamsSchema },
  {
    name: "get",
    summary: "Fetch a record by Id, or contacts by Email and companies by Domain",
    key: "required",
    schema: GetParamsSchema,
    notes: "needs Id, or the type's alternate key",
  },
  {
    name: "list",
    summary: `Page through records (Limit defaults to ${DEFAULT_PAGE_LIMIT})`,
    key: "required",
    schema: ListParamsSchema,
  },
  {
    name: "search",
    summary: `Search records (Limit defaults to ${DEFAULT_PAGE_LIMIT}, After to 0)`,
    key: "required",
    schema: SearchParamsSchema,
  },
  { name: "create", summary: "Create a record from a property map", key: "required", schema: CreateParamsSchema },
  { name: "update", summary: "Update record properties", key: "required", schema: UpdateParamsSchema },
  { name: "delete", summary: "Archive a record", key: "required", schema: DeleteParamsSchema },
  {
    name: "associate",
    summary: "Create the default association to another record",
    key: "required",
    schema: AssociateParamsSchema,
  },
];

export type RecordLookup =
  | { by: "id"; id: string }
  | { by: "email"; email: string }
  | { by: "domain"; domain: string };

export type HubspotCommand =
  | { action: "owners" }
  | { action: "properties"; objectType: ObjectTypeDefinition }
  | { action: "get"; objectType: ObjectTypeDefinition; lookup: RecordLookup; fields?: string[] }
  | { action: "list"; objectType: ObjectTypeDefinition; params: ListParams }
  | { action: "search"; objectType: ObjectTypeDefinition; params: SearchParams }
  | { action: "create"; objectType: ObjectTypeDefinition; properties: Record<string, unknown> }
  | {
      action: "update";
      objectType: ObjectTypeDefinition;
      id: string;
      properties: Record<string, unknown>;
    }
  | { action: "delete"; objectType: ObjectTypeDefinition; id: string }
  | {
      action: "associate";
      objectType: ObjectTypeDefinition;
      id: string;
      toType: ObjectTypeDefinition;
      toId: string;
    };

/**
 * Pick the lookup for "get": the Id when present, else the type's alternate key
 */
export function resolveLookup(
  objectType: ObjectTypeDefinition,
  params: z.output<typeof GetParamsSchema>
): RecordLookup {
  if (params.Id !== undefined) {
    return { by: "id", id: params.Id };
  }
  const alternate = objectType.alternateKey;
  if (alternate?.parameter === "Email" && params.Email !== undefined) {
    return { by: "email", email: params.Email };
  }
  if (alternate?.parameter === "Domain" && params.Domain !== undefined) {
    return { by: "domain", domain: params.Domain };
  }
  const expected = alternate ? `Id or ${alternate.parameter}` : "Id";
  throw new MissingParameterError(expected, "get");
}

/**
 * Decode action name, object type and parameter bag, validating each level on its own
 */
export function decodeHubspotCommand(
  action: string,
  objectTypeName: string | undefined,
  bag: ParameterBag
): HubspotCommand {
  const definition = findAction(HUBSPOT_ACTIONS, action);
  const objectType = (): ObjectTypeDefinition =>
    resolveObjectType(requirePrimaryKey(definition, objectTypeName, HUBSPOT_KEY_LABEL));

  switch (definition.name) {
    case "owners":
      return { action: "owners" };
    case "properties":
      return { action: "properties", objectType: objectType() };
    case "get": {
      const type = objectType();
      const params = decodeParameters(GetParamsSchema, bag, "get");
      const lookup = resolveLookup(type, params);
      return params.Fields
        ? { action: "get", objectType: type, lookup, fields: params.Fields }
        : { action: "get", objectType: type, lookup };
    }
    case "list":
      return { action: "list", objectType: objectType(), params: decodeParameters(ListParamsSchema, bag, "list") };
    case "search":
      return {
        action: "search",
        objectType: objectType(),
        params: decodeParameters(SearchParamsSchema, bag, "search"),
      };
    case "create":
      return {
        action: "create",
        objectType: objectType(),
        properties: decodeParameters(CreateParamsSchema, bag, "create").Properties,
      };
    case "update": {
      const type = objectType();
      const params = decodeParameters(UpdateParamsSchema, bag, "update");
      return { action: "update", objectType: type, id: params.Id, properties: params.Properties };
    }
    case "delete":
      return {
        action: "delete",
        objectType: objectType(),
        id: decodeParameters(DeleteParamsSchema, bag, "delete").Id,
      };
    case "associate": {
      const type = objectType();
      const params = decodeParameters(AssociateParamsSchema, bag, "associate");
      return {
        action: "associate",
        objectType: type,
        id: params.Id,
        toType: resolveObjectType(params.ToType),
        toId: params.ToId,
      };
    }
    default:
      throw new UnsupportedActionError(
        action,
        HUBSPOT_ACTIONS.map((entry) => entry.name)
      );
  }
}
