export interface SectionPromptInput {
  title: string;
  description: string;
}

export function buildSectionExpansionPrompt({ title, description }: SectionPromptInput): string {
  return `Analyze this research paper and extract detailed structured information about the following section:

Section: ${title}
Description: ${description}

Extract and provide:
1. A comprehensive summary (2-4 paragraphs) of the section content
2. Key points and main findings
3. Methodologies or approaches described (if applicable)
4. Results or findings with their significance (if applicable)
5. Figures, tables, or equations referenced with descriptions
6. Key citations mentioned in this section

Set section_title to "${title}" exactly.
Focus on this specific section and extract all relevant structured information.
Be thorough and capture important details, data, and references.`;
}
