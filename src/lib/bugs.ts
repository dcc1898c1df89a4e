// Bug references in commit titles, e.g. "Bug 123 - Fix crash" or "b=123"

const BUG_ID_SOURCE = "\\b(?:bug|b=)\\s*(\\d+)\\b";
const BUG_ID_RE = new RegExp(BUG_ID_SOURCE, "i");
const ALL_BUG_IDS_RE = new RegExp(BUG_ID_SOURCE, "gi");

export function parseBugIds(title: string): string[] {
  return [...title.matchAll(ALL_BUG_IDS_RE)].map((match) => match[1]);
}

/**
 * Put `bugId` into the title: the first bug reference is rewritten to
 * "Bug N", and a title without one gets a "Bug N - " prefix.
 */
export function applyBugId(title: string, bugId: string | null): string {
  if (bugId === null) return title;
  if (BUG_ID_RE.test(title)) {
    return title.replace(BUG_ID_RE, `Bug ${bugId}`);
  }
  return `Bug ${bugId} - ${title}`;
}
