// Reviewer specifiers in commit titles, e.g. "Fix crash r?alice,bob!" or "r=#frontend"

export interface Reviewers {
  request: string[]; // r?
  granted: string[]; // r=
}

export interface ReviewerArgs {
  reviewers: string[]; // -r, a trailing "!" marks a blocker
  blockers: string[]; // -R
}

const NICK_CHARS = "a-zA-Z0-9\\-_!";
const NICK = `#?[${NICK_CHARS}]+`;
const LIST = "[;,\\/\\\\]\\s*";
const LIST_RE = new RegExp(LIST);

function reviewersRe(specifier: string): RegExp {
  return new RegExp(
    `([\\s(.\\[;,])(r${specifier})(${NICK}(?:${LIST}(?![a-z0-9.\\-]+[=?])${NICK})*)?`,
    "g",
  );
}

const ALL_REVIEWERS_RE = reviewersRe("[=?]");
const REQUEST_REVIEWERS_RE = reviewersRe("[?]");
const GRANTED_REVIEWERS_RE = reviewersRe("=");
const R_SPECIFIER_RE = /\br[=?]/;
const BLOCKING_REVIEWERS_RE = new RegExp(`\\b(r!)([${NICK_CHARS},]+)`, "g");

function stripBang(reviewer: string): string {
  return reviewer.replace(/^!+|!+$/g, "");
}

function collect(title: string, re: RegExp): string[] {
  const result: string[] = [];
  for (const match of title.matchAll(re)) {
    if (match[3]) {
      result.push(...match[3].split(LIST_RE));
    }
  }
  return result;
}

/**
 * Read the r? and r= reviewer lists from a commit title
 */
export function parseReviewers(title: string): Reviewers {
  return {
    request: collect(title, REQUEST_REVIEWERS_RE),
    granted: collect(title, GRANTED_REVIEWERS_RE),
  };
}

/**
 * Rewrite the common `r!alice` typo to `r=alice!`
 */
export function morphBlockingReviewers(title: string): string {
  return title.replace(
    BLOCKING_REVIEWERS_RE,
    (_match, _prefix: string, list: string) => {
      let nicks = list;
      let suffix = "";
      if (nicks.endsWith(",") || nicks.endsWith(".")) {
        suffix = nicks.slice(-1);
        nicks = nicks.slice(0, -1);
      }
      const blocking = nicks
        .split(",")
        .map((nick) => `${nick.replace(/!+$/, "")}!`)
        .join(",");
      return `r=${blocking}${suffix}`;
    },
  );
}

export function makeBlocking(reviewers: string[]): string[] {
  return reviewers.map((reviewer) => `${reviewer.replace(/!+$/, "")}!`);
}

/**
 * Drop repeated nicks, preferring the blocking form when both appear
 */
export function removeDuplicates(reviewers: string[]): string[] {
  let unique: string[] = [];
  const nicks: string[] = [];
  for (const reviewer of reviewers) {
    const nick = stripBang(reviewer.toLowerCase());
    if (reviewer.endsWith("!") && nicks.includes(nick)) {
      nicks.splice(nicks.indexOf(nick), 1);
      unique = unique.filter((r) => stripBang(r.toLowerCase()) !== nick);
    }
    if (!nicks.includes(nick)) {
      nicks.push(nick);
      unique.push(reviewer);
    }
  }
  return unique;
}

function reviewerList(args: ReviewerArgs): {
  reviewers: string[];
  blockers: string[];
} {
  const requested = [...new Set(args.reviewers)].sort();
  const blockers = [
    ...new Set([
      ...args.blockers.map((r) => r.replace(/!+$/, "")),
      ...requested
        .filter((r) => r.endsWith("!"))
        .map((r) => r.replace(/!+$/, "")),
    ]),
  ].sort();

  const plain = requested
    .map(stripBang)
    .filter((r) => !blockers.includes(r.toLowerCase()));
  return {
    reviewers: removeDuplicates([...plain, ...makeBlocking(blockers)]),
    blockers,
  };
}

function removeOnce(list: string[], value: string): void {
  const index = list.indexOf(value);
  if (index !== -1) {
    list.splice(index, 1);
  }
}

/**
 * Combine the title's reviewers with -r/-R flags. Flags replace the title's
 * list: reviewers already requested in the title stay requested, the rest
 * are added as granted. Without flags, `alwaysBlocking` turns every title
 * reviewer into a blocker.
 */
export function resolveReviewers(
  fromTitle: Reviewers,
  args: ReviewerArgs,
  alwaysBlocking: boolean,
): Reviewers {
  const { reviewers, blockers } = reviewerList(args);

  if (reviewers.length === 0) {
    if (alwaysBlocking) {
      return {
        request: makeBlocking(fromTitle.request),
        granted: makeBlocking(fromTitle.granted),
      };
    }
    return { request: [...fromTitle.request], granted: [...fromTitle.granted] };
  }

  const lowerReviewers = reviewers.map((r) => r.toLowerCase());
  const lowerBlockers = blockers.map((r) => r.toLowerCase());
  const granted = [...reviewers];
  const request: string[] = [];
  for (const reviewer of fromTitle.request) {
    const nick = stripBang(reviewer);
    if (lowerReviewers.includes(nick.toLowerCase())) {
      request.push(nick);
      removeOnce(granted, nick);
    } else if (lowerBlockers.includes(nick.toLowerCase())) {
      request.push(`${nick}!`);
      removeOnce(granted, `${nick}!`);
    }
  }
  return { request, granted };
}

export function hasReviewers(reviewers: Reviewers): boolean {
  return reviewers.request.length > 0 || reviewers.granted.length > 0;
}

/**
 * Rewrite the reviewer specifiers of a title to match `reviewers`
 */
export function replaceReviewers(title: string, reviewers: Reviewers): string {
  const parts: string[] = [];
  if (reviewers.request.length) parts.push(`r?${reviewers.request.join(",")}`);
  if (reviewers.granted.length) parts.push(`r=${reviewers.granted.join(",")}`);
  const replacement = parts.join(" ");

  if (title === "") {
    return replacement;
  }

  let result: string;
  if (!R_SPECIFIER_RE.test(title)) {
    result = `${title} ${replacement}`;
  } else {
    let first = true;
    result = title.replace(
      ALL_REVIEWERS_RE,
      (match: string, lead: string, specifier: string) => {
        if (!R_SPECIFIER_RE.test(specifier)) {
          return match;
        }
        if (first) {
          first = false;
          return lead + replacement;
        }
        return "\0";
      },
    );
    // Later specifiers were replaced by NUL; drop them with their separators
    result = result
      .replace(new RegExp(`${LIST}\\0`, "g"), "")
      .replace(/\0/g, "");
  }
  return result.trim();
}
