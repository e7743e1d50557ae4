// The SQL grammar rejects `-` inside identifiers, so the raw query is escaped
// before parsing and every extracted name/literal is unescaped afterwards.
// A literal `_` in user input comes back as `-`: the mapping is not reversible
// for such input.

export function escapeHyphens(text: string): string {
  return text.replaceAll("-", "_");
}

export function unescapeHyphens(text: string): string {
  return text.replaceAll("_", "-");
}
