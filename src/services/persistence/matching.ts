/**
 * Heuristics that tie a license's contact email to an organization profile.
 */

import ispDomains from "../../data/isp-domains.json" with { type: "json" };
import tlds from "../../data/tlds.json" with { type: "json" };

const ISP_DOMAINS: ReadonlySet<string> = new Set(ispDomains);
const TLDS: ReadonlySet<string> = new Set(tlds);

// ============================================================================
// Domains
// ============================================================================

/**
 * Lower-cased domain of an email address, or null when the address fails
 * the basic checks: exactly one "@", not in first position, and a "." at
 * least one character after it.
 */
export function getDomainFromEmail(email: string): string | null {
  const trimmed = email.trim();
  const at = trimmed.lastIndexOf("@");
  const dot = trimmed.lastIndexOf(".");

  if (at <= 0 || dot <= at + 1 || trimmed.indexOf("@") !== at) {
    return null;
  }
  return trimmed.slice(at + 1).toLowerCase();
}

export function isIspDomain(domain: string): boolean {
  return ISP_DOMAINS.has(domain.toLowerCase());
}

/**
 * Strip TLD and country-code labels from the right, then keep the
 * rightmost remaining label: "mail.acme.co.uk" -> "acme".
 */
export function shortenDomain(domain: string): string {
  const labels = domain.replace(/\.+$/, "").split(".");
  while (labels.length > 1 && TLDS.has((labels.at(-1) ?? "").toLowerCase())) {
    labels.pop();
  }
  return labels.at(-1) ?? "";
}

/**
 * First character plus every character that follows a space
 */
export function getInitials(value: string): string {
  let initials = value.charAt(0);
  for (let i = 1; i < value.length; i++) {
    if (value[i - 1] === " ") {
      initials += value.charAt(i);
    }
  }
  return initials;
}

// ============================================================================
// Best match
// ============================================================================

function comparableName(name: string): string {
  return name.includes(".") ? shortenDomain(name) : name;
}

/**
 * True when the response words start with a run of company words and every
 * other response word comes after that run.
 */
function mismatchesAreAtEnd(
  companyWords: readonly string[],
  responseWords: readonly string[],
  mismatches: number
): boolean {
  if (companyWords.length === 0 || responseWords.length === 0) {
    return false;
  }

  let matches = 0;
  while (companyWords[matches] === responseWords[matches]) {
    matches++;
    if (matches === companyWords.length || matches === responseWords.length) {
      break;
    }
  }
  return matches > 0 && matches + mismatches === responseWords.length;
}

function matchesByWords(name: string, companyWords: readonly string[]): boolean {
  const responseWords = comparableName(name)
    .toLowerCase()
    .split(/\s+/)
    .filter((word) => word !== "");

  const matches = companyWords.filter((word) =>
    responseWords.includes(word)
  ).length;
  const mismatches = responseWords.length - matches;

  if (matches > 0 && mismatches === 0) {
    return true;
  }
  return mismatchesAreAtEnd(companyWords, responseWords, mismatches);
}

/**
 * Index of the single best candidate name for a company whose contact uses
 * `domain`, or null when there is no match or more than one.
 *
 * A candidate equal to the shortened domain, to its initials, or to the
 * domain with spaces removed wins outright. Prefix and word matches only
 * nominate candidates; a pick needs exactly one nominee.
 */
export function pickMatch(
  company: string,
  domain: string,
  names: ReadonlyArray<string | null>
): number | null {
  if (company.length < 2) {
    return null;
  }

  const shortDomain = shortenDomain(domain);
  const target = shortDomain.toLowerCase();
  const companyWords = company.toLowerCase().split(" ");

  const candidates: string[] = [];
  const picks: number[] = [];
  const nominate = (name: string, index: number): void => {
    if (!candidates.includes(name)) {
      candidates.push(name);
      picks.push(index);
    }
  };

  for (const [index, rawName] of names.entries()) {
    if (rawName === null || rawName.trim() === "") {
      continue;
    }
    const original = rawName.trim();
    const name = comparableName(original);
    const lowered = name.toLowerCase();

    if (lowered === target) {
      return index;
    }
    if (lowered.startsWith(target)) {
      nominate(original, index);
    }
    if (getInitials(name).toLowerCase() === target) {
      return index;
    }

    if (name.includes("Venture") && !shortDomain.includes("Venture")) {
      continue;
    }

    const noSpaces = lowered.replaceAll(" ", "");
    if (noSpaces === target) {
      return index;
    }
    if (noSpaces.startsWith(target)) {
      nominate(original, index);
    }

    if (matchesByWords(rawName, companyWords)) {
      if (!candidates.includes(rawName)) {
        candidates.push(rawName);
      }
      if (!picks.includes(index)) {
        picks.push(index);
      }
    }
  }

  return picks.length === 1 ? (picks[0] ?? null) : null;
}
