/**
 * Semantic Validator contract.
 *
 * The validator is an external capability (a language model, a rules engine,
 * a reviewer tool). The core only knows this request/response shape; responses
 * are checked against docs/contracts/semantic_validation_response.schema.json
 * before anything reads them.
 */

import type { CatalogEntry } from '../types';

export interface LexicalMatchSummary {
  catalog_id: string;
  text_span: string;
  score: number;
}

export interface SemanticValidationRequest {
  document_text: string;
  lexical_matches: LexicalMatchSummary[];
  unmatched_fragments: string[];
  catalog_subset: CatalogEntry[];
}

export interface SemanticVerdict {
  catalog_id: string;
  accepted: boolean;
  confidence: number;
  evidence_text: string;
  justification: string;
  suggested_example: string;
}

export interface SemanticNewItem {
  request_text: string;
  evidence_text: string;
  suggested_catalog_id?: string | null;
  is_new: boolean;
  justification: string;
}

export interface SemanticValidationResponse {
  validations: SemanticVerdict[];
  new_items: SemanticNewItem[];
  overall_confidence: number;
  all_captured: boolean;
}

/**
 * Anything able to judge lexical candidates. Implementations return the raw
 * payload; the matching stage validates it.
 */
export interface SemanticValidator {
  readonly name: string;
  validate(request: SemanticValidationRequest): Promise<unknown>;
}
