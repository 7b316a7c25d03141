export const normalizeWhitespace = (value: string) =>
  value.replace(/\s+/g, " ").trim();

// Letters and digits only, lowercased. Used for every name/title/keyword comparison.
export const normalize = (value?: string | null) =>
  (value ?? "").replace(/[^a-zA-Z0-9]/g, "").toLowerCase();

export const dedupe = (values: string[]) => {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    if (!value || seen.has(value)) {
      continue;
    }
    seen.add(value);
    result.push(value);
  }
  return result;
};
