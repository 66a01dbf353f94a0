/**
 * Shared TypeScript Types
 *
 * Types for the disclosure-order triage pipeline, matching the JSON schemas
 * in docs/contracts/
 */

// ============================================================================
// Structural Classification
// ============================================================================

export type StructuralType = 'complete_order' | 'email_thread' | 'fragment' | 'indeterminate';

export type OrderClass = 'first_request' | 'reiteration' | 'supplement' | 'indeterminate';

/** Marker families scanned by the structural classifier. */
export type MarkerFamily =
  | 'email_headers'
  | 'order_markers'
  | 'process_number'
  | 'tax_identifier'
  | 'reiteration'
  | 'supplement';

export interface InputClassification {
  structural_type: StructuralType;
  order_class: OrderClass;
  has_order_markers: boolean;
  has_ocr_delimiters: boolean;
  has_process_number: boolean;
  has_identifiers: boolean;
  /** Matched families / families checked, in [0, 1]. */
  confidence: number;
  matched_markers: MarkerFamily[];
}

// ============================================================================
// Relevance
// ============================================================================

export type InstitutionType =
  | 'target_institution'
  | 'financial_institution'
  | 'central_bank'
  | 'tax_authority'
  | 'telecom_operator'
  | 'police'
  | 'indeterminate';

export type SecrecyType = 'banking' | 'fiscal' | 'telephone' | 'mixed' | 'indeterminate';

export interface MentionedInstitution {
  type: InstitutionType;
  name: string | null;
  excerpt: string;
  is_direct_addressee: boolean;
  confidence: number;
}

export interface RelevanceDecision {
  is_relevant: boolean;
  reason: string;
  confidence: number;
  institutions: MentionedInstitution[];
  has_multiple_addressees: boolean;
  secrecy_type: SecrecyType;
  /** Concatenated financial-institution blocks when the document has several addressees. */
  relevant_span: string | null;
}

// ============================================================================
// Catalog
// ============================================================================

export interface CatalogEntry {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly examples: readonly string[];
}

/** Sentinel catalog id for requests the catalog does not cover. */
export const UNCATALOGUED_ID = 'UNCATALOGUED';

// ============================================================================
// Parties
// ============================================================================

export type PartyKind = 'individual' | 'corporate';

export type TaxIdType = 'personal' | 'corporate';

export interface InvestigatedParty {
  /** Normalized tax id when present, otherwise normalized name. */
  key: string;
  name: string;
  tax_id: string | null;
  tax_id_type: TaxIdType | null;
  party_kind: PartyKind;
  identifier_missing: boolean;
  confidence: number;
}

export interface PartyExtraction {
  parties: InvestigatedParty[];
  more_parties_possible: boolean;
}

// ============================================================================
// Periods
// ============================================================================

export type RelativeUnit = 'days' | 'months' | 'years';

export type PeriodBound =
  | { kind: 'absolute'; date: string }
  | { kind: 'relative'; amount: number; unit: RelativeUnit }
  | { kind: 'reference_date' }
  | { kind: 'since_inception' }
  | { kind: 'unresolved' };

export interface PeriodRequirement {
  start: PeriodBound;
  end: PeriodBound;
  source_text: string | null;
}

// ============================================================================
// Subsidy Matches
// ============================================================================

export type MatchSource = 'lexical' | 'validated' | 'validator_added';

export interface SubsidyMatch {
  /** Catalog id, or UNCATALOGUED_ID for requests awaiting manual triage. */
  catalog_id: string;
  subsidy_name: string;
  uncatalogued: boolean;
  source: MatchSource;
  text_span: string;
  /** Lexical similarity in [0, 1]; 0 when the validator surfaced the item. */
  score: number;
  /** Effective confidence used for aggregation, in [0, 1]. */
  confidence: number;
  semantic_validated: boolean;
  semantic_confidence: number | null;
  evidence_text: string | null;
  justification: string | null;
  suggested_example: string | null;
  /** Raw period expression found next to the request, if any. */
  period_reference: string | null;
  period: PeriodRequirement | null;
  circular_reference: string | null;
  requires_counterpart: boolean;
}

export interface PartyPeriod {
  /** Party key, or '*' when the order names no party. */
  party_key: string;
  party_name: string | null;
  catalog_id: string;
  period: PeriodRequirement;
}

// ============================================================================
// Annotations
// ============================================================================

export interface RegulatoryCircular {
  number: string;
  year: string | null;
  source_text: string;
  catalog_ids: string[];
  applies_to_all: boolean;
  confidence: number;
}

export type CounterpartKind = 'account' | 'beneficiary' | 'tax_identification' | 'sender';

export interface CounterpartRequirement {
  required: boolean;
  catalog_ids: string[];
  evidence: string[];
  kinds: CounterpartKind[];
  applies_to_all: boolean;
  confidence: number;
}

// ============================================================================
// Lookup
// ============================================================================

export interface MinimalLookupInfo {
  process_numbers: string[];
  personal_ids: string[];
  corporate_ids: string[];
  names: string[];
  can_lookup: boolean;
}

// ============================================================================
// Processing Result
// ============================================================================

export type RoutingStatus =
  | 'automatic'
  | 'human_review'
  | 'manual_analysis'
  | 'reiteration_held'
  | 'not_relevant'
  | 'insufficient_info'
  | 'error';

export type ValidatorStatus = 'accepted' | 'unavailable' | 'malformed' | 'skipped';

export interface WarrantProcessingResult {
  session_id: string;
  state: string;
  state_history: string[];
  classification: InputClassification | null;
  order_class: OrderClass;
  should_process: boolean;
  relevance: RelevanceDecision | null;
  parties: InvestigatedParty[];
  matches: SubsidyMatch[];
  periods: PartyPeriod[];
  circulars: RegulatoryCircular[];
  counterpart_requirement: CounterpartRequirement | null;
  unidentified_requests: string[];
  validator_status: ValidatorStatus;
  reference_date: string | null;
  needs_external_lookup: boolean;
  lookup_data: MinimalLookupInfo | null;
  overall_confidence: number;
  alerts: string[];
  routing_status: RoutingStatus;
  error: string | null;
}
