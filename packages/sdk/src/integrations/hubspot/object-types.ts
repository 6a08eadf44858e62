/**
 * CRM object types the HubSpot tool supports
 */

import { UnsupportedObjectTypeError } from "../../errors.js";

export type ObjectTypeName = "contacts" | "companies" | "deals" | "tickets";

export interface AlternateKey {
  /** Parameter name in the bag */
  parameter: "Email" | "Domain";
  /** CRM property the value is matched against */
  property: "email" | "domain";
  /** "idProperty" resolves with a direct GET, "search" with an EQ filter */
  strategy: "idProperty" | "search";
}

export interface ObjectTypeDefinition {
  name: ObjectTypeName;
  singular: string;
  /** Property holding the human-facing name */
  displayProperty: string;
  alternateKey?: AlternateKey;
  /** Whether list and search drop auto-generated tenant records */
  filtersSynthetic: boolean;
}

export const OBJECT_TYPES: readonly ObjectTypeDefinition[] = [
  {
    name: "contacts",
    singular: "contact",
    displayProperty: "email",
    alternateKey: { parameter: "Email", property: "email", strategy: "idProperty" },
    filtersSynthetic: false,
  },
  {
    name: "companies",
    singular: "company",
    displayProperty: "name",
    alternateKey: { parameter: "Domain", property: "domain", strategy: "search" },
    filtersSynthetic: true,
  },
  { name: "deals", singular: "deal", displayProperty: "dealname", filtersSynthetic: true },
  { name: "tickets", singular: "ticket", displayProperty: "subject", filtersSynthetic: false },
];

/**
 * Resolve a type name, singular or plural, ignoring case
 */
export function resolveObjectType(raw: string): ObjectTypeDefinition {
  const wanted = raw.trim().toLowerCase();
  const match = OBJECT_TYPES.find((type) => type.name === wanted || type.singular === wanted);
  if (!match) {
    throw new UnsupportedObjectTypeError(
      raw,
      OBJECT_TYPES.map((type) => type.name)
    );
  }
  return match;
}
