/**
 * Request-fragment segmentation.
 *
 * Finds the spans of an order that ask for data and cuts them into atomic
 * request items, each of which is matched against the catalog independently.
 */

const NOT_LETTER_BEFORE = '(?<![\\p{L}])';
const NOT_LETTER_AFTER = '(?![\\p{L}])';

/** Directive verbs; the captured body runs to the next blank line. */
const DIRECTIVE_PATTERN = new RegExp(
  NOT_LETTER_BEFORE +
    '(?:determino|determina-se|solicito|solicita-se|requisito|requisita-se|requeiro|oficie-se|' +
    'i[ \\t]+(?:hereby[ \\t]+)?(?:order|request|require|direct)|' +
    '(?:it[ \\t]+is[ \\t]+)?(?:hereby[ \\t]+)?ordered[ \\t]+that)' +
    NOT_LETTER_AFTER +
    '[ \\t]*[:\\-–]?([\\s\\S]*?)(?=\\n[ \\t]*\\n|$)',
  'giu'
);

/** "Provide/disclose ..." clauses up to the end of the sentence. */
const PROVIDE_PATTERN = new RegExp(
  NOT_LETTER_BEFORE +
    '(?:forne[çc]a(?:m)?|fornecer|disponibilize(?:m)?|disponibilizar|informe(?:m)?|informar|apresente(?:m)?|apresentar|encaminhe(?:m)?|' +
    'provide|disclose|inform|furnish|produce|submit)' +
    NOT_LETTER_AFTER +
    '([^.;\\n]*)',
  'giu'
);

/** Domain nouns, kept inside the captured span. */
const DOMAIN_NOUN_PATTERN = new RegExp(
  NOT_LETTER_BEFORE +
    '((?:extratos?|saldos?|movimenta[çc](?:ão|ões|ao|oes)|faturas?|dados[ \\t]+cadastrais|' +
    'statements?|balances?|transactions?|movements?|account[ \\t]+records?|registration[ \\t]+data)' +
    NOT_LETTER_AFTER +
    '[^.;\\n]*)',
  'giu'
);

const ITEM_SEPARATOR = /[;,\n]/;
const LEADING_BULLET = /^\s*(?:[-–•*·]+|\(?[a-z0-9ivx]{1,3}[).])\s*/iu;
const TRAILING_PUNCTUATION = /[\s.;:,]+$/u;

interface CapturedSpan {
  start: number;
  end: number;
  text: string;
}

function collect(pattern: RegExp, text: string, taken: CapturedSpan[]): void {
  for (const match of text.matchAll(pattern)) {
    const body = match[1];
    const start = match.index;
    if (body === undefined || start === undefined) continue;
    if (taken.some((span) => start >= span.start && start < span.end)) continue;
    taken.push({ start, end: start + match[0].length, text: body });
  }
}

function cleanItem(raw: string): string {
  return raw.replace(LEADING_BULLET, '').replace(TRAILING_PUNCTUATION, '').replace(/\s+/g, ' ').trim();
}

/**
 * Cut canonical order text into atomic request items in document order.
 * Items shorter than `minLength` characters are dropped; duplicates collapse.
 */
export function segmentRequests(text: string, minLength: number): string[] {
  const taken: CapturedSpan[] = [];
  collect(DIRECTIVE_PATTERN, text, taken);
  collect(PROVIDE_PATTERN, text, taken);
  collect(DOMAIN_NOUN_PATTERN, text, taken);

  taken.sort((a, b) => a.start - b.start);

  const items: string[] = [];
  const seen = new Set<string>();
  for (const span of taken) {
    for (const piece of span.text.split(ITEM_SEPARATOR)) {
      const item = cleanItem(piece);
      if (item.length < minLength) continue;
      const key = item.toLowerCase();
      if (seen.has(key)) continue;
      seen.add(key);
      items.push(item);
    }
  }
  return items;
}
