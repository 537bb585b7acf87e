// Letters and digits of any script survive; punctuation and spacing do not.
export function nameTokens(value: string): string[] {
  return value
    .normalize("NFKC")
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0);
}

function normalizeNamePart(value: string): string {
  return nameTokens(value).join("");
}

export function normalizeEmail(email?: string): string {
  if (!email) return "";
  return email.trim().toLowerCase().replace(/^mailto:/, "");
}

const companySuffixes = new Set(["inc", "llc", "ltd", "gmbh", "corp", "corporation", "co", "limited"]);

export function companyTokens(company: string): string[] {
  return nameTokens(company).filter((token) => !companySuffixes.has(token));
}

export function normalizeCompany(company: string): string {
  return companyTokens(company).join("");
}

export function nameCompanyKey(lead: { name: string; company: string }): string {
  return `${normalizeNamePart(lead.name)}|${normalizeCompany(lead.company)}`;
}

// Email is the strongest identity; name+company only decides when one side has no email.
export function isSameLead(
  a: { name: string; company: string; email?: string },
  b: { name: string; company: string; email?: string }
): boolean {
  const emailA = normalizeEmail(a.email);
  const emailB = normalizeEmail(b.email);
  if (emailA && emailB) return emailA === emailB;
  if (!normalizeNamePart(a.name) || !normalizeCompany(a.company)) return false;
  return nameCompanyKey(a) === nameCompanyKey(b);
}

export function hasSourceUrl(value?: string): value is string {
  return typeof value === "string" && value.trim().length > 0;
}
