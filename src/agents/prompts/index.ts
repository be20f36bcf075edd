export { OUTLINE_PROMPT } from './outline';
export { buildSectionExpansionPrompt, type SectionPromptInput } from './sectionExpansion';
