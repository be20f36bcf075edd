import { describe, it, expect } from '@jest/globals';
import { SchemaType, type Schema } from '@google/generative-ai';
import { z } from 'zod';
import { PaperOutlineSchema, SectionExpansionSchema } from '../src/agents/schemas';
import { toResponseSchema } from '../src/agents/responseSchema';

describe('Agent schemas', () => {
  it('accepts an outline with only a title and sections', () => {
    const result = PaperOutlineSchema.safeParse({
      title: 'Attention Is All You Need',
      sections: [{ title: 'Introduction' }],
    });

    expect(result.success).toBe(true);
  });

  it('accepts null for optional outline fields', () => {
    const result = PaperOutlineSchema.safeParse({
      title: 'A Paper',
      authors: null,
      abstract: null,
      keywords: null,
      sections: [{ title: 'Intro', description: null, subsections: null }],
    });

    expect(result.success).toBe(true);
  });

  it('rejects an outline without sections', () => {
    const result = PaperOutlineSchema.safeParse({ title: 'A Paper' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['sections']);
    }
  });

  it('requires summary and key points on a section expansion', () => {
    const result = SectionExpansionSchema.safeParse({ section_title: 'Intro', summary: 'S' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((issue) => issue.path.join('.'))).toEqual(['key_points']);
    }
  });

  it('validates nested methodology entries', () => {
    const result = SectionExpansionSchema.safeParse({
      section_title: 'Model',
      summary: 'S',
      key_points: [],
      methodologies: [{ name: 'Multi-head attention' }],
    });

    expect(result.success).toBe(false);
  });
});

type ObjectResponseSchema = Extract<Schema, { type: SchemaType.OBJECT }>;
type ArrayResponseSchema = Extract<Schema, { type: SchemaType.ARRAY }>;

function asObject(schema: Schema | undefined): ObjectResponseSchema {
  if (!schema || schema.type !== SchemaType.OBJECT) {
    throw new Error(`expected an object schema, got ${schema?.type}`);
  }
  return schema;
}

function asArray(schema: Schema | undefined): ArrayResponseSchema {
  if (!schema || schema.type !== SchemaType.ARRAY) {
    throw new Error(`expected an array schema, got ${schema?.type}`);
  }
  return schema;
}

describe('toResponseSchema', () => {
  it('marks optional fields nullable and leaves them out of required', () => {
    const schema = asObject(toResponseSchema(PaperOutlineSchema));

    expect(schema.required).toEqual(['title', 'sections']);
    expect(schema.properties.authors).toEqual({
      type: SchemaType.ARRAY,
      description: 'List of paper authors',
      items: { type: SchemaType.STRING },
      nullable: true,
    });
  });

  it('carries descriptions through nested objects', () => {
    const schema = asObject(toResponseSchema(SectionExpansionSchema));
    const methodologies = asArray(schema.properties.methodologies);
    const methodology = asObject(methodologies.items);

    expect(methodologies.nullable).toBe(true);
    expect(methodology.properties.name).toEqual({
      type: SchemaType.STRING,
      description: 'Name of the method or approach',
    });
    expect(methodology.required).toEqual(['name', 'description']);
  });

  it('maps integers and booleans', () => {
    const schema = asObject(
      toResponseSchema(z.object({ page: z.number().int(), score: z.number(), cited: z.boolean() }))
    );

    expect(schema.properties.page?.type).toBe(SchemaType.INTEGER);
    expect(schema.properties.score?.type).toBe(SchemaType.NUMBER);
    expect(schema.properties.cited?.type).toBe(SchemaType.BOOLEAN);
  });

  it('rejects shapes Gemini cannot express', () => {
    expect(() => toResponseSchema(z.object({ data: z.record(z.string()) }))).toThrow(
      'Unsupported schema type for Gemini response schema: ZodRecord'
    );
  });
});
