import { SchemaType, type Schema } from '@google/generative-ai';
import { z } from 'zod';

/**
 * Converts a zod schema into the OpenAPI subset Gemini accepts as a
 * `responseSchema`. Optional and nullable fields become `nullable` and are
 * left out of `required`; field descriptions are carried over so the model
 * sees the same guidance the zod schema documents.
 *
 * Only the shapes used by the extraction schemas are supported: objects,
 * arrays, strings, numbers and booleans.
 */
export function toResponseSchema(
  schema: z.ZodTypeAny,
  description: string | undefined = schema.description
): Schema {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return { ...toResponseSchema(schema.unwrap(), description), nullable: true };
  }

  if (schema instanceof z.ZodObject) {
    const properties: Record<string, Schema> = {};
    const required: string[] = [];
    for (const [key, field] of Object.entries<z.ZodTypeAny>(schema.shape)) {
      properties[key] = toResponseSchema(field);
      if (!field.isOptional()) {
        required.push(key);
      }
    }
    return { type: SchemaType.OBJECT, description, properties, required };
  }

  if (schema instanceof z.ZodArray) {
    return { type: SchemaType.ARRAY, description, items: toResponseSchema(schema.element) };
  }

  if (schema instanceof z.ZodString) {
    return { type: SchemaType.STRING, description };
  }

  if (schema instanceof z.ZodNumber) {
    return schema.isInt
      ? { type: SchemaType.INTEGER, description }
      : { type: SchemaType.NUMBER, description };
  }

  if (schema instanceof z.ZodBoolean) {
    return { type: SchemaType.BOOLEAN, description };
  }

  throw new Error(`Unsupported schema type for Gemini response schema: ${schema._def.typeName}`);
}
