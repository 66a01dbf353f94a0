/**
 * Classification Patterns
 *
 * Marker families for the structural classifier and addressee patterns for
 * the relevance filter. Patterns are matched against folded text
 * (lowercase, no diacritics) unless noted.
 */

import type { InstitutionType, MarkerFamily } from '../types';

const B = '(?<![\\p{L}])';
const E = '(?![\\p{L}])';

function words(alternatives: string): RegExp {
  return new RegExp(`${B}(?:${alternatives})${E}`, 'u');
}

/** Header lines of a forwarded or quoted e-mail. Two or more make a thread. */
export const EMAIL_HEADER_LINE =
  /^[ \t>]*(?:from|to|sent|subject|date|cc|de|para|enviado(?:[ \t]+em)?|assunto|data)[ \t]*:/gmu;

export const MIN_EMAIL_HEADER_LINES = 2;

export const OCR_BLOCK = /<<OCR>>([\s\S]*?)<<OCR>>/g;

export const MARKER_PATTERNS: Record<Exclude<MarkerFamily, 'email_headers' | 'process_number' | 'tax_identifier'>, RegExp> = {
  order_markers: words(
    'poder judiciario|oficio|mandado|vara|comarca|juiz(?:a|o)?|juizo|tribunal|' +
      'court|judge|warrant|subpoena|court[ \\t]+order|judicial[ \\t]+order'
  ),
  reiteration: words(
    'reitero|reitera(?:-se)?|reiteracao|reiterando|prazo[ \\t]+vencido|nao[ \\t]+atendid[oa]|' +
      'reiterat(?:e|es|ed|ing|ion)|second[ \\t]+request|final[ \\t]+notice|overdue|not[ \\t]+(?:yet[ \\t]+)?(?:been[ \\t]+)?complied[ \\t]+with'
  ),
  supplement: words(
    'complementa(?:r|cao|ndo)?|complementar|aditamento|adita(?:-se)?|em[ \\t]+complemento|' +
      'supplement(?:al|ary|ing)?|addendum|in[ \\t]+addition[ \\t]+to[ \\t]+(?:the|our)[ \\t]+(?:previous|prior)'
  ),
};

/** Addressee introductions: "OFICIE-SE ao Banco X", "send an official letter to ...". */
export const ADDRESS_TO_MARKER = new RegExp(
  `${B}(?:oficie-se|expeca-se(?:[ \\t]+oficio)?|officie-se|encaminhe-se(?:[ \\t]+oficio)?|` +
    `send(?:[ \\t]+an?)?(?:[ \\t]+official)?[ \\t]+(?:letter|order|notice|request)s?)${E}` +
    `[ \\t]*(?:ao|a|aos|as|à|to(?:[ \\t]+the)?)?${E}`,
  'gu'
);

export const INSTITUTION_PATTERNS: Array<{ type: InstitutionType; pattern: RegExp }> = [
  {
    type: 'central_bank',
    pattern: words('banco[ \\t]+central(?:[ \\t]+do[ \\t]+brasil)?|bacen|central[ \\t]+bank|federal[ \\t]+reserve|ccs|sisbajud'),
  },
  {
    type: 'financial_institution',
    pattern: words(
      'instituicao(?:oes)?[ \\t]+financeiras?|instituicoes[ \\t]+financeiras|banco|bank|financial[ \\t]+institutions?|' +
        'cooperativa[ \\t]+de[ \\t]+credito|credit[ \\t]+union|corretora|brokerage'
    ),
  },
  {
    type: 'tax_authority',
    pattern: words('receita[ \\t]+federal|secretaria[ \\t]+da[ \\t]+fazenda|fazenda[ \\t]+nacional|tax[ \\t]+authority|revenue[ \\t]+service|irs'),
  },
  {
    type: 'telecom_operator',
    pattern: words('operadora|telefonia|telecom|vivo|claro|tim|oi|telephone[ \\t]+compan(?:y|ies)|carrier|mobile[ \\t]+operator'),
  },
  {
    type: 'police',
    pattern: words('policia(?:[ \\t]+(?:federal|civil))?|delegacia|delegado|police|sheriff|law[ \\t]+enforcement'),
  },
];

export const SECRECY_PATTERNS = {
  banking: words('sigilo[ \\t]+bancario|quebra[ \\t]+do[ \\t]+sigilo[ \\t]+bancario|bank(?:ing)?[ \\t]+secrecy|financial[ \\t]+privacy|bank[ \\t]+records'),
  fiscal: words('sigilo[ \\t]+fiscal|tax[ \\t]+secrecy|tax[ \\t]+records|declaracoes?[ \\t]+de[ \\t]+imposto|tax[ \\t]+returns?'),
  telephone: words('sigilo[ \\t]+telefonico|sigilo[ \\t]+telematico|interceptacao|telephone[ \\t]+records|phone[ \\t]+records|call[ \\t]+records|wiretap'),
};

/** Vocabulary that implies banking data even without a named addressee. */
export const BANKING_VOCABULARY = words(
  'extratos?|saldos?|conta[ \\t]+corrente|contas?|movimentac(?:ao|oes)|aplicacoes[ \\t]+financeiras|' +
    'statements?|balances?|checking|savings|bank[ \\t]+accounts?|accounts?|wire[ \\t]+transfers?'
);
