import Ajv, { type ErrorObject } from "ajv";
import addFormats from "ajv-formats";

import type { RulesDocument, StoreDocument } from "lib/metrics/types.js";

import rulesSchema from "../../../lib/schemas/rules.schema.json";
import storeSchema from "../../../lib/schemas/store.schema.json";

const ajv = new Ajv({ allErrors: true, strict: false, allowUnionTypes: true });
addFormats(ajv);

const rulesValidator = ajv.compile<RulesDocument>(rulesSchema);
const storeValidator = ajv.compile<StoreDocument>(storeSchema);

export type ValidationResult<T> = { valid: true; value: T } | { valid: false; errors: string[] };

export function validateRulesDocument(document: unknown): ValidationResult<RulesDocument> {
  if (rulesValidator(document)) {
    return { valid: true, value: document };
  }
  return { valid: false, errors: formatErrors(rulesValidator.errors) };
}

export function validateStoreDocument(document: unknown): ValidationResult<StoreDocument> {
  if (storeValidator(document)) {
    return { valid: true, value: document };
  }
  return { valid: false, errors: formatErrors(storeValidator.errors) };
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors) {
    return ["Unknown validation error"];
  }
  return errors.map((error) => `${error.instancePath || "/"} ${error.message ?? "invalid"}`);
}
