/**
 * Semantic validation prompt.
 *
 * Asks the model to confirm or reject lexical subsidy candidates, quote the
 * order's exact wording, and surface requests the lexical pass missed.
 */

import type { PromptTemplate } from './types';

export const SEMANTIC_VALIDATION_TEMPLATE: PromptTemplate = {
  name: 'semantic_validation',
  version: '1.0.0',
  description: 'Validate lexical subsidy matches against a bank-secrecy disclosure order',

  systemPrompt: `You are an analyst of court orders that lift bank secrecy.
Each order asks a bank for categories of banking data ("subsidies"). A lexical
matcher has already proposed catalog entries for the order; your job is to
judge them.

Rules:
1. Be strict. Reject a candidate that the order does not actually request.
2. Quote evidence verbatim from the order. Never paraphrase.
3. suggested_example is a short, generic phrasing that could be added to the
   catalog entry's examples (e.g. "checking account statements").
4. When an unmatched fragment is a variant of an existing catalog entry, report
   it in new_items with that entry's id in suggested_catalog_id and is_new = false.
5. Report a request that no catalog entry covers with suggested_catalog_id = null
   and is_new = true.
6. Confidence values run from 0.0 (guess) to 1.0 (certain).
7. all_captured is true only when every request in the order is covered by an
   accepted candidate or a new item.
8. Only use catalog ids that appear in the catalog listing.`,

  userPromptTemplate: `## ORDER
\`\`\`
{{document_text}}
\`\`\`

## LEXICAL CANDIDATES
{{lexical_matches}}

## UNMATCHED FRAGMENTS
{{unmatched_fragments}}

## CATALOG
{{catalog}}

Return one verdict in "validations" for every lexical candidate.`,
};

/**
 * JSON Schema for the response (OpenAI Structured Outputs). Mirrors
 * docs/contracts/semantic_validation_response.schema.json in strict form.
 */
export const SEMANTIC_VALIDATION_SCHEMA = {
  name: 'semantic_validation',
  strict: true,
  schema: {
    type: 'object',
    additionalProperties: false,
    required: ['validations', 'new_items', 'overall_confidence', 'all_captured'],
    properties: {
      validations: {
        type: 'array',
        items: {
          type: 'object',
          additionalProperties: false,
          required: ['catalog_id', 'accepted', 'confidence', 'evidence_text', 'justification', 'suggested_example'],
          properties: {
            catalog_id: { type: 'string' },
            accepted: { type: 'boolean' },
            confidence: { type: 'number' },
            evidence_text: { type: 'string' },
            justification: { type: 'string' },
            suggested_example: { type: 'string' },
          },
        },
      },
      new_items: {
        type: 'array',
        items: {
          type: 'object',
          additionalProperties: false,
          required: ['request_text', 'evidence_text', 'suggested_catalog_id', 'is_new', 'justification'],
          properties: {
            request_text: { type: 'string' },
            evidence_text: { type: 'string' },
            suggested_catalog_id: { type: ['string', 'null'] },
            is_new: { type: 'boolean' },
            justification: { type: 'string' },
          },
        },
      },
      overall_confidence: { type: 'number' },
      all_captured: { type: 'boolean' },
    },
  },
} as const;
