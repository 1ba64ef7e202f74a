/**
 * Zod validation helpers.
 */

import { z, type ZodError, type ZodRawShape, type ZodType } from "zod";

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

/** Validate input against a Zod schema, returning a structured result. */
export function validateInput<T>(schema: ZodType<T, z.ZodTypeDef, unknown>, input: unknown): ValidationResult<T> {
  const result = schema.safeParse(input);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    error: formatZodError(result.error),
  };
}

/** Format a ZodError into a human-readable string. */
export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
      return `${path}${issue.message}`;
    })
    .join("; ");
}

function withDescription(schema: ZodType, json: Record<string, unknown>): Record<string, unknown> {
  return schema.description ? { ...json, description: schema.description } : json;
}

/**
 * Convert a Zod schema to JSON Schema for tool parameters.
 * Covers the shapes tool schemas use; anything else becomes an unconstrained value.
 */
export function zodToJsonSchema(schema: ZodType): Record<string, unknown> {
  if (schema instanceof z.ZodObject) {
    const shape: ZodRawShape = schema.shape;
    const properties: Record<string, unknown> = {};
    const required: string[] = [];

    for (const [key, value] of Object.entries(shape)) {
      properties[key] = zodToJsonSchema(value);
      if (!value.isOptional()) {
        required.push(key);
      }
    }

    return withDescription(schema, {
      type: "object",
      properties,
      ...(required.length > 0 ? { required } : {}),
      additionalProperties: false,
    });
  }

  if (schema instanceof z.ZodString) {
    return withDescription(schema, { type: "string" });
  }
  if (schema instanceof z.ZodNumber) {
    return withDescription(schema, { type: schema.isInt ? "integer" : "number" });
  }
  if (schema instanceof z.ZodBoolean) {
    return withDescription(schema, { type: "boolean" });
  }
  if (schema instanceof z.ZodArray) {
    return withDescription(schema, {
      type: "array",
      items: zodToJsonSchema(schema.element),
    });
  }
  if (schema instanceof z.ZodEnum) {
    return withDescription(schema, { type: "string", enum: schema.options });
  }
  if (schema instanceof z.ZodLiteral) {
    return withDescription(schema, { const: schema.value });
  }
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return zodToJsonSchema(schema.unwrap());
  }
  if (schema instanceof z.ZodDefault) {
    return zodToJsonSchema(schema.removeDefault());
  }
  if (schema instanceof z.ZodRecord) {
    return withDescription(schema, {
      type: "object",
      additionalProperties: zodToJsonSchema(schema.valueSchema),
    });
  }

  return withDescription(schema, {});
}
