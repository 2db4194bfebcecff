// Club codes start with the code of their provincial committee
const REGION_PREFIXES: Record<string, string> = {
  A: "Antwerpen",
  BBW: "Brabant Wallon / Bruxelles",
  H: "Hainaut",
  L: "Liège",
  Lx: "Luxembourg",
  N: "Namur",
  OVL: "Oost-Vlaanderen",
  "Vl-B": "Vlaams-Brabant",
  WVL: "West-Vlaanderen",
  VTTL: "VTTL (Fédération Flamande)",
  AFTT: "AFTT (Fédération Francophone)",
  FR: "France (mutation)",
};

// Longest prefix wins: "Lx01" is Luxembourg, not Liège
const ORDERED_PREFIXES = Object.keys(REGION_PREFIXES).sort(
  (a, b) => b.length - a.length
);

export function deriveRegion(code: string): string | null {
  const upper = code.trim().toUpperCase();
  for (const prefix of ORDERED_PREFIXES) {
    if (upper.startsWith(prefix.toUpperCase())) {
      return REGION_PREFIXES[prefix] ?? null;
    }
  }
  return null;
}

export function knownRegions(): string[] {
  return [...new Set(Object.values(REGION_PREFIXES))].sort();
}
