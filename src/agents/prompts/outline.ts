export const OUTLINE_PROMPT = `Analyze this research paper and extract a comprehensive structured outline.

Extract the following information:
1. Full paper title
2. List of all authors, in the order they are listed
3. Abstract or summary
4. All major sections, in document order, with:
   - Section title, exactly as printed
   - Brief description of content
   - Any subsection titles
5. Key terms and concepts

Be thorough and capture all structural elements of the paper.
Include sections like Abstract, Introduction, Related Work, Methodology,
Results, Discussion, Conclusion, etc.
Every section title must be unique within the outline.`;
