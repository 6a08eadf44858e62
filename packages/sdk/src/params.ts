/**
 * Parameter bag merging and decoding
 */

import { z } from "zod";
import { InvalidParameterError, MissingParameterError } from "./errors.js";

export type ParameterBag = Record<string, unknown>;

const BagSchema = z.record(z.string(), z.unknown());

function isPlainObject(value: unknown): value is ParameterBag {
  return BagSchema.safeParse(value).success && !Array.isArray(value);
}

/**
 * Parse a JSON-encoded parameter bag. The text must hold a JSON object.
 */
export function parseParameterJson(text: string, source = "--json"): ParameterBag {
  let parsed: unknown;
  try {
    // Strip BOM if present
    const cleaned = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
    parsed = JSON.parse(cleaned);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidParameterError(source, "*", `invalid JSON (${reason})`, { cause: err });
  }
  if (!isPlainObject(parsed)) {
    throw new InvalidParameterError(source, "*", "expected a JSON object");
  }
  return parsed;
}

/**
 * Merge the structured map and the JSON-text map. JSON text is applied second,
 * so its values win on key collision.
 */
export function mergeParameterBags(structured?: ParameterBag, jsonText?: string): ParameterBag {
  const merged: ParameterBag = { ...structured };
  if (jsonText !== undefined && jsonText.trim() !== "") {
    for (const [key, value] of Object.entries(parseParameterJson(jsonText))) {
      // An own "__proto__" key from JSON.parse would replace the bag's prototype on assignment
      if (key === "__proto__") {
        continue;
      }
      merged[key] = value;
    }
  }
  return merged;
}

/**
 * Decode a bag against an action's schema. Keys the schema does not name are dropped.
 * A key that is absent from the bag and required by the schema raises MissingParameterError.
 */
export function decodeParameters<S extends z.ZodTypeAny>(
  schema: S,
  bag: ParameterBag,
  action: string
): z.output<S> {
  const result = schema.safeParse(bag);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const head = issue?.path[0];
  const parameter = head === undefined ? "*" : String(head);
  if (parameter !== "*" && bag[parameter] === undefined) {
    throw new MissingParameterError(parameter, action);
  }
  throw new InvalidParameterError(parameter, action, issue?.message ?? "invalid value");
}

// Shared field schemas

/** Identifier given as a string or a bare number that survives a round trip through a double */
export const IdSchema = z
  .union([z.string().trim().min(1), z.number().int().safe()])
  .transform((value) => String(value));

export const ObjectSchema = z.record(z.string(), z.unknown());

export const PageSizeSchema = z.union([
  z.number().int().min(0),
  z
    .string()
    .trim()
    .regex(/^\d+$/, "Expected a non-negative integer")
    .transform((value) => Number(value)),
]);

function scalarToString(value: unknown): unknown {
  return typeof value === "number" || typeof value === "boolean" ? String(value) : value;
}

/**
 * Accept a number or boolean where text is expected, as `-p Assignee=10042` yields one
 */
export function asText<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(scalarToString, schema);
}

/** Names given as an array or a comma-separated string */
export const NameListSchema = z
  .union([z.array(z.string()), z.string()])
  .transform((value) =>
    (Array.isArray(value) ? value : value.split(","))
      .map((entry) => entry.trim())
      .filter(Boolean)
  );

export const FlagSchema = z.union([
  z.boolean(),
  z.enum(["true", "false"]).transform((value) => value === "true"),
]);
