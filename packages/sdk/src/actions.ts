/**
 * Action catalog shared by the three integrations
 */

import type { z } from "zod";
import type { CredentialSource } from "./credentials.js";
import { MissingPrimaryKeyError, UnsupportedActionError } from "./errors.js";

export type KeyRequirement = "required" | "optional" | "none";

export interface ActionDefinition {
  name: string;
  summary: string;
  key: KeyRequirement;
  schema: z.AnyZodObject;
  /** Extra usage line, e.g. parameters that are required in combination */
  notes?: string;
}

export interface ParameterDescription {
  name: string;
  required: boolean;
}

/**
 * Static description of a REST service a tool talks to
 */
export interface ServiceConfig {
  name: string;
  baseUrlEnv: string;
  defaultBaseUrl: string;
  credentials: CredentialSource;
}

/**
 * List the parameters an action reads, in declaration order
 */
export function describeParameters(definition: ActionDefinition): ParameterDescription[] {
  const shape: Record<string, z.ZodTypeAny> = definition.schema.shape;
  return Object.entries(shape).map(([name, field]) => ({
    name,
    required: !field.isOptional(),
  }));
}

/**
 * Look up an action by name, ignoring case
 */
export function findAction<D extends ActionDefinition>(catalog: readonly D[], name: string): D {
  const wanted = name.trim().toLowerCase();
  const match = catalog.find((definition) => definition.name === wanted);
  if (!match) {
    throw new UnsupportedActionError(
      name,
      catalog.map((definition) => definition.name)
    );
  }
  return match;
}

/**
 * Return the positional key when the action needs one
 */
export function requirePrimaryKey(
  definition: ActionDefinition,
  key: string | undefined,
  keyLabel: string
): string {
  const trimmed = key?.trim();
  if (!trimmed) {
    throw new MissingPrimaryKeyError(keyLabel, definition.name);
  }
  return trimmed;
}
