/**
 * HubSpot CRM v3 object actions
 */

import { UnexpectedResponseError } from "../../errors.js";
import { encodeSegment, type RestClient } from "../../transport.js";
import type { ObjectTypeDefinition } from "./object-types.js";
import type { HubspotCommand, ListParams, RecordLookup, SearchParams } from "./schemas.js";
import { CrmPageSchema, filterSyntheticRecords, type CrmRecord } from "./synthetic.js";

function objectsPath(objectType: ObjectTypeDefinition, suffix = ""): string {
  return `/crm/v3/objects/${objectType.name}${suffix}`;
}

function joinFields(fields: string[] | undefined): string | undefined {
  return fields && fields.length > 0 ? fields.join(",") : undefined;
}

/**
 * Requested properties for a page, with the display property added when synthetic filtering needs it
 */
function pageFields(
  objectType: ObjectTypeDefinition,
  fields: string[] | undefined,
  includeSynthetic: boolean
): string[] | undefined {
  if (!fields || fields.length === 0 || includeSynthetic || !objectType.filtersSynthetic) {
    return fields;
  }
  return fields.includes(objectType.displayProperty) ? fields : [...fields, objectType.displayProperty];
}

/**
 * Apply synthetic-record filtering where the type calls for it
 */
function presentPage(
  client: RestClient,
  path: string,
  objectType: ObjectTypeDefinition,
  raw: unknown,
  includeSynthetic: boolean
): unknown {
  if (includeSynthetic || !objectType.filtersSynthetic) {
    return raw;
  }
  const parsed = CrmPageSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UnexpectedResponseError(`${client.baseUrl}${path}`, "expected a page with a results array");
  }
  return filterSyntheticRecords(parsed.data, objectType.displayProperty);
}

export async function listOwners(client: RestClient): Promise<unknown> {
  return client.call("GET", "/crm/v3/owners");
}

export async function listProperties(client: RestClient, objectType: ObjectTypeDefinition): Promise<unknown> {
  return client.call("GET", `/crm/v3/properties/${objectType.name}`);
}

export async function findCompanyByDomain(
  client: RestClient,
  domain: string,
  fields?: string[]
): Promise<CrmRecord | null> {
  const path = "/crm/v3/objects/companies/search";
  const raw = await client.call("POST", path, {
    body: {
      filterGroups: [{ filters: [{ propertyName: "domain", operator: "EQ", value: domain }] }],
      limit: 1,
      ...(fields && fields.length > 0 ? { properties: fields } : {}),
    },
  });
  const parsed = CrmPageSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UnexpectedResponseError(`${client.baseUrl}${path}`, "expected a page with a results array");
  }
  return parsed.data.results[0] ?? null;
}

/**
 * Fetch one record with exactly one request, keyed by id or by the type's alternate key
 */
export async function getRecord(
  client: RestClient,
  objectType: ObjectTypeDefinition,
  lookup: RecordLookup,
  fields?: string[]
): Promise<unknown> {
  const properties = joinFields(fields);
  switch (lookup.by) {
    case "id":
      return client.call("GET", objectsPath(objectType, `/${encodeSegment(lookup.id)}`), {
        query: { properties },
      });
    case "email":
      return client.call("GET", objectsPath(objectType, `/${encodeSegment(lookup.email)}`), {
        query: { idProperty: "email", properties },
      });
    case "domain":
      return findCompanyByDomain(client, lookup.domain, fields);
  }
}

export async function listRecords(
  client: RestClient,
  objectType: ObjectTypeDefinition,
  params: ListParams
): Promise<unknown> {
  const path = objectsPath(objectType);
  const raw = await client.call("GET", path, {
    query: {
      limit: params.Limit,
      after: params.After,
      properties: joinFields(pageFields(objectType, params.Fields, params.IncludeSynthetic)),
    },
  });
  return presentPage(client, path, objectType, raw, params.IncludeSynthetic);
}

export function buildSearchBody(params: SearchParams, objectType: ObjectTypeDefinition): Record<string, unknown> {
  const body: Record<string, unknown> = { limit: params.Limit, after: params.After };
  if (params.Query !== undefined) {
    body.query = params.Query;
  }
  if (params.Filters !== undefined && params.Filters.length > 0) {
    body.filterGroups = [{ filters: params.Filters }];
  }
  if (params.Sorts !== undefined) {
    body.sorts = params.Sorts;
  }
  const fields = pageFields(objectType, params.Fields, params.IncludeSynthetic);
  if (fields !== undefined && fields.length > 0) {
    body.properties = fields;
  }
  return body;
}

export async function searchRecords(
  client: RestClient,
  objectType: ObjectTypeDefinition,
  params: SearchParams
): Promise<unknown> {
  const path = objectsPath(objectType, "/search");
  const raw = await client.call("POST", path, { body: buildSearchBody(params, objectType) });
  return presentPage(client, path, objectType, raw, params.IncludeSynthetic);
}

export async function createRecord(
  client: RestClient,
  objectType: ObjectTypeDefinition,
  properties: Record<string, unknown>
): Promise<unknown> {
  return client.call("POST", objectsPath(objectType), { body: { properties } });
}

/**
 * Partial update: only the given properties change
 */
export async function updateRecord(
  client: RestClient,
  objectType: ObjectTypeDefinition,
  id: string,
  properties: Record<string, unknown>
): Promise<unknown> {
  return client.call("PATCH", objectsPath(objectType, `/${encodeSegment(id)}`), { body: { properties } });
}

export async function deleteRecord(
  client: RestClient,
  objectType: ObjectTypeDefinition,
  id: string
): Promise<unknown> {
  return client.call("DELETE", objectsPath(objectType, `/${encodeSegment(id)}`));
}

export async function associateRecords(
  client: RestClient,
  objectType: ObjectTypeDefinition,
  id: string,
  toType: ObjectTypeDefinition,
  toId: string
): Promise<unknown> {
  const path =
    `/crm/v4/objects/${objectType.name}/${encodeSegment(id)}` +
    `/associations/default/${toType.name}/${encodeSegment(toId)}`;
  return client.call("PUT", path);
}

export async function executeHubspotCommand(client: RestClient, command: HubspotCommand): Promise<unknown> {
  switch (command.action) {
    case "owners":
      return listOwners(client);
    case "properties":
      return listProperties(client, command.objectType);
    case "get":
      return getRecord(client, command.objectType, command.lookup, command.fields);
    case "list":
      return listRecords(client, command.objectType, command.params);
    case "search":
      return searchRecords(client, command.objectType, command.params);
    case "create":
      return createRecord(client, command.objectType, command.properties);
    case "update":
      return updateRecord(client, command.objectType, command.id, command.properties);
    case "delete":
      return deleteRecord(client, command.objectType, command.id);
    case "associate":
      return associateRecords(client, command.objectType, command.id, command.toType, command.toId);
  }
}
