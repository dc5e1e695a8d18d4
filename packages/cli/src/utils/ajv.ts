// pattern: Functional Core
import AjvModule from "ajv";

import { ValidationError } from "./errors.js";

import type { TSchema } from "@sinclair/typebox";
import type { ErrorObject } from "ajv";

// ajv is published as CommonJS; its class sits on the default export
const Ajv = AjvModule.default;

// Create singleton AJV instance configured for TypeBox schemas
const ajv = new Ajv({
  // Ignore TypeBox's custom attributes (Symbol keys)
  strict: false,
  allowUnionTypes: true,
  allErrors: true,
});

export { ajv };

/**
 * Render ajv errors as "path: message" strings
 */
export function describeAjvErrors(
  errors: ErrorObject[] | null | undefined
): string[] {
  return (errors ?? []).map(
    err => `${err.instancePath || "root"}: ${err.message ?? "invalid"}`
  );
}

/**
 * Compile a TypeBox schema into a validator that throws ValidationError
 * with every schema violation listed
 */
export function compileValidator<T>(
  schema: TSchema,
  subject: string
): (data: unknown) => T {
  const validate = ajv.compile<T>(schema);

  return (data: unknown): T => {
    if (validate(data)) {
      return data;
    }
    const messages = describeAjvErrors(validate.errors);
    throw new ValidationError(
      `${subject} validation failed: ${messages.join(", ")}`,
      messages
    );
  };
}
