/**
 * Placeholder name detection.
 *
 * Flags resource names that are syntactically generic ("my_table",
 * "your_schema.events") rather than real warehouse identifiers.
 *
 * Pure functions: no I/O, no side effects.
 */

// ---------------------------------------------------------------------------
// Pattern set
// ---------------------------------------------------------------------------

export interface PlaceholderPatternSet {
  /** Lowercase names matched against the whole name and each token. */
  exact: ReadonlySet<string>;
  /** Lowercase prefixes matched against the start of the whole name. */
  prefixes: readonly string[];
}

export const PLACEHOLDER_PATTERNS: PlaceholderPatternSet = {
  exact: new Set([
    "my_database",
    "my_schema",
    "my_table",
    "my_connection",
    "your_database",
    "your_schema",
    "your_table",
    "your_connection",
    "example_db",
    "sample_schema",
    "test_table",
    "database_name",
    "schema_name",
    "table_name",
    "connection_name",
    "user_confirmed",
    "user_chosen",
    "placeholder",
  ]),
  prefixes: [
    "my_",
    "your_",
    "demo_",
    "example_",
    "sample_",
    "dummy_",
    "fake_",
    "placeholder_",
  ],
};

// ---------------------------------------------------------------------------
// Detection
// ---------------------------------------------------------------------------

/** Anything that cannot appear in an unquoted SQL identifier splits tokens. */
const TOKEN_DELIMITER_RE = /[^a-z0-9_]+/;

export function tokenizeName(name: string): string[] {
  return name
    .trim()
    .toLowerCase()
    .split(TOKEN_DELIMITER_RE)
    .filter((t) => t.length > 0);
}

export function isPlaceholderName(
  name: string,
  patterns: PlaceholderPatternSet = PLACEHOLDER_PATTERNS,
): boolean {
  const normalized = name.trim().toLowerCase();
  if (normalized.length === 0) return false;

  if (patterns.exact.has(normalized)) return true;
  if (tokenizeName(normalized).some((t) => patterns.exact.has(t))) return true;
  return patterns.prefixes.some((p) => normalized.startsWith(p));
}

/**
 * Return every name that looks like a placeholder, in first-seen order,
 * without duplicates.
 */
export function findPlaceholderNames(
  names: Iterable<string>,
  patterns: PlaceholderPatternSet = PLACEHOLDER_PATTERNS,
): string[] {
  const found: string[] = [];
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) continue;
    seen.add(name);
    if (isPlaceholderName(name, patterns)) {
      found.push(name);
    }
  }
  return found;
}
