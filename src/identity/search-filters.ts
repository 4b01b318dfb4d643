import type { IdentitySearchFilter } from "../types.js";

/**
 * Ordered identity search filters for a free-text member token.
 *
 * Names and emails try `General` first, bare aliases try `DirectoryAlias`
 * first. `MailAddress` is always tried; `AccountName` only for
 * `DOMAIN\user` forms; `LocalGroupName` last, unless the token looks like
 * an email or account name.
 */
export function determineSearchFilters(member: string): IdentitySearchFilter[] {
  const token = member.trim();

  const candidates: IdentitySearchFilter[] =
    token.includes(" ") || token.includes("@") ? ["General", "DirectoryAlias"] : ["DirectoryAlias", "General"];
  candidates.push("MailAddress");
  if (token.includes("\\")) {
    candidates.push("AccountName");
  }
  if (!token.includes("@") && !token.includes("\\")) {
    candidates.push("LocalGroupName");
  }

  const seen = new Set<string>();
  const result: IdentitySearchFilter[] = [];
  for (const filter of candidates) {
    const key = filter.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(filter);
  }
  return result;
}
