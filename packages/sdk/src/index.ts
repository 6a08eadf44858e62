/**
 * OpsBridge SDK
 *
 * Authenticated REST transport and action libraries for Elasticsearch, JIRA and HubSpot
 */

export {
  OpsBridgeError,
  MissingCredentialError,
  MissingParameterError,
  MissingPrimaryKeyError,
  InvalidParameterError,
  UnsupportedActionError,
  UnsupportedObjectTypeError,
  AmbiguousMatchError,
  UnexpectedResponseError,
  ApiError,
} from "./errors.js";

export type { Credentials, CredentialSource, Prompter, ResolveCredentialsOptions } from "./credentials.js";
export { resolveCredentials, authorizationHeader, credentialVariables } from "./credentials.js";

export type { HttpMethod, QueryValue, RequestOptions, RestClient, RestClientOptions } from "./transport.js";
export { createRestClient, buildUrl, encodeSegment, DEFAULT_TIMEOUT_MS } from "./transport.js";

export type { ParameterBag } from "./params.js";
export { mergeParameterBags, parseParameterJson, decodeParameters } from "./params.js";

export type {
  ActionDefinition,
  KeyRequirement,
  ParameterDescription,
  ServiceConfig,
} from "./actions.js";
export { describeParameters, findAction, requirePrimaryKey } from "./actions.js";

export type { LogLevel, LogEvent } from "./observability/logs.js";
export { Logger, logger, parseLogLevel } from "./observability/logs.js";

export * as elastic from "./integrations/elastic/index.js";
export * as jira from "./integrations/jira/index.js";
export * as hubspot from "./integrations/hubspot/index.js";
