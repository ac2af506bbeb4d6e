const EN_DASH = "–";
const EM_DASH = "—";
export const ELLIPSIS = "…";

/**
 * Splits a run of two or more hyphens into dashes. Em dashes come first, then
 * en dashes; every dash covers two (en) or three (em) hyphens.
 */
export function dashSubstitutions(hyphens: number): string[] {
  let em: number;
  let en: number;
  if (hyphens % 3 === 0) {
    em = hyphens / 3;
    en = 0;
  } else if (hyphens % 2 === 0) {
    em = 0;
    en = hyphens / 2;
  } else if (hyphens % 3 === 2) {
    em = (hyphens - 2) / 3;
    en = 1;
  } else {
    em = (hyphens - 4) / 3;
    en = 2;
  }
  return [...Array<string>(em).fill(EM_DASH), ...Array<string>(en).fill(EN_DASH)];
}

export function dashWidth(dash: string): number {
  return dash === EM_DASH ? 3 : 2;
}

/** Curly replacement for a straight quote; opening only when it can open and cannot close. */
export function smartQuote(quote: "'" | '"', leftFlanking: boolean, rightFlanking: boolean): string {
  const opening = leftFlanking && !rightFlanking;
  if (quote === "'") return opening ? "‘" : "’";
  return opening ? "“" : "”";
}
