export type TokenPattern = { label: string; regex: RegExp };

const KNOWN_TOKEN_PATTERNS: TokenPattern[] = [
  { label: "vault service token", regex: /\bhvs\.[A-Za-z0-9_-]{20,}\b/ },
  { label: "vault batch token", regex: /\bhvb\.[A-Za-z0-9_-]{20,}\b/ },
  { label: "github token", regex: /\bghp_[A-Za-z0-9]{20,}\b/ },
  { label: "slack token", regex: /\bxox[baprs]-[A-Za-z0-9-]{10,}\b/ },
  { label: "pem block", regex: /-----BEGIN [A-Z ]+-----/ },
];

export function detectKnownToken(value: string): TokenPattern | null {
  const s = String(value || "").trim();
  if (!s) return null;
  for (const p of KNOWN_TOKEN_PATTERNS) {
    if (p.regex.test(s)) return p;
  }
  return null;
}
