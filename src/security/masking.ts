/**
 * Sensitive-data masking.
 * Replaces card-like numbers, email addresses and phone-like numbers with
 * sequential placeholders before any request text is shown to the model.
 *
 * This is a heuristic, three-pattern policy and a known residual-risk
 * boundary: formats it does not recognise pass through unchanged.
 * It is also not idempotent: in text with two `@` signs the email match can
 * leave a second address-like tail that a later pass masks again
 * (`a@b.x6@c.x` becomes `EMAIL_TOKEN_1@c.x`, then `EMAIL_TOKEN_1`).
 */

export type MaskKind = 'CARD' | 'EMAIL' | 'PHONE';

interface MaskRule {
  kind: MaskKind;
  pattern: RegExp;
}

/**
 * Applied in this order. Cards must run before phones: both match raw digit
 * runs, and a phone match would otherwise eat part of a card number.
 */
const MASK_RULES: readonly MaskRule[] = [
  { kind: 'CARD', pattern: /\b(?:\d[ -]*?){13,16}\b/g },
  { kind: 'EMAIL', pattern: /[\w.-]+@[\w.-]+\.\w+/g },
  { kind: 'PHONE', pattern: /\b\+?\d{1,3}[- ]?\d{3,5}[- ]?\d{4,10}\b/g },
];

const TOKEN_PATTERN = /\b(CARD|EMAIL|PHONE)_TOKEN_\d+\b/g;

/**
 * Mask sensitive substrings. Numbering restarts at 1 per call and per kind,
 * so the output depends only on the input.
 *
 * @example
 * maskSensitiveText('mail a@b.io or c@d.io'); // 'mail EMAIL_TOKEN_1 or EMAIL_TOKEN_2'
 */
export function maskSensitiveText(input: string): string {
  if (input === '') {
    return input;
  }

  let output = input;
  for (const rule of MASK_RULES) {
    let index = 0;
    output = output.replace(rule.pattern, () => {
      index += 1;
      return `${rule.kind}_TOKEN_${index}`;
    });
  }
  return output;
}

/** Count the placeholders of each kind in already-masked text (for audit logs) */
export function countMaskedTokens(masked: string): Record<MaskKind, number> {
  const counts: Record<MaskKind, number> = { CARD: 0, EMAIL: 0, PHONE: 0 };
  for (const match of masked.matchAll(TOKEN_PATTERN)) {
    const kind = match[1];
    if (kind === 'CARD' || kind === 'EMAIL' || kind === 'PHONE') {
      counts[kind] += 1;
    }
  }
  return counts;
}
