/**
 * Prompt Template Types
 *
 * Templates encode the instructions sent to a language-model backend.
 */

export interface PromptTemplate {
  /** Stable template name, logged with every request */
  name: string;

  /** Bumped whenever the wording changes */
  version: string;

  /** System prompt with the task rules */
  systemPrompt: string;

  /**
   * User prompt template with placeholders:
   * - {{document_text}}: canonical order text
   * - {{lexical_matches}}: lexical candidates, one per line
   * - {{unmatched_fragments}}: request items without a candidate
   * - {{catalog}}: catalog subset, one entry per line
   */
  userPromptTemplate: string;

  /** Human-readable description of the template's purpose */
  description: string;
}

/**
 * Fill `{{name}}` placeholders. Unknown placeholders are left as they are.
 */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (placeholder, key: string) => values[key] ?? placeholder);
}
