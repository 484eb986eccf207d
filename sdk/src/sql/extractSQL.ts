const SQL_BLOCK = /<SQL>\s*([\s\S]*?)\s*<\/SQL>/i;

/**
 * Extract the first statement wrapped in <SQL></SQL>.
 * Returns null when there is no tagged block or the block is empty.
 */
export function extractSQL(text: string): string | null {
  const match = SQL_BLOCK.exec(text);
  if (!match) {
    return null;
  }
  const sql = match[1].trim();
  return sql.length > 0 ? sql : null;
}
