import { z } from 'zod';

export const SectionSchema = z.object({
  title: z.string().describe('Section title'),
  description: z.string().nullish().describe('Brief description of section content'),
  subsections: z
    .array(z.string())
    .nullish()
    .describe('List of subsection titles if any'),
});

export type Section = z.infer<typeof SectionSchema>;

export const PaperOutlineSchema = z.object({
  title: z.string().describe('The full title of the research paper'),
  authors: z.array(z.string()).nullish().describe('List of paper authors'),
  abstract: z.string().nullish().describe('Paper abstract or summary'),
  sections: z.array(SectionSchema).describe('Main sections of the paper'),
  keywords: z
    .array(z.string())
    .nullish()
    .describe('Key terms and concepts in the paper'),
});

export type PaperOutline = z.infer<typeof PaperOutlineSchema>;

/** A paper outline carrying the URL it was extracted from. */
export const OutlineSchema = PaperOutlineSchema.extend({
  pdf_url: z.string(),
});

export type Outline = z.infer<typeof OutlineSchema>;

export const MethodologySchema = z.object({
  name: z.string().describe('Name of the method or approach'),
  description: z.string().describe('How the method works and where it is used'),
});

export type Methodology = z.infer<typeof MethodologySchema>;

export const ResultSchema = z.object({
  finding: z.string().describe('The result or finding'),
  significance: z.string().describe('Why the finding matters'),
});

export type Result = z.infer<typeof ResultSchema>;

export const FigureOrTableSchema = z.object({
  type: z.string().describe('Type: figure, table, or equation'),
  caption: z.string().describe('Caption or label as printed in the paper'),
  description: z.string().describe('What the element shows'),
});

export type FigureOrTable = z.infer<typeof FigureOrTableSchema>;

export const SectionExpansionSchema = z.object({
  section_title: z.string().describe('The title of the section being expanded'),
  summary: z
    .string()
    .describe('Comprehensive summary of the section (2-3 paragraphs)'),
  key_points: z
    .array(z.string())
    .describe('Main points and findings in this section'),
  methodologies: z
    .array(MethodologySchema)
    .nullish()
    .describe('Methods or approaches described (if applicable)'),
  results: z
    .array(ResultSchema)
    .nullish()
    .describe('Key results or findings (if applicable)'),
  figures_and_tables: z
    .array(FigureOrTableSchema)
    .nullish()
    .describe('Visual elements referenced in this section'),
  citations: z
    .array(z.string())
    .nullish()
    .describe('Key references cited in this section'),
});

export type SectionExpansion = z.infer<typeof SectionExpansionSchema>;
