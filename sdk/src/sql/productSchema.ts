/**
 * Columns of the read-only `product` table, in table order
 */
export const PRODUCT_COLUMNS = [
  { name: 'product_link', type: 'TEXT' },
  { name: 'title', type: 'TEXT' },
  { name: 'brand', type: 'TEXT' },
  { name: 'price', type: 'INTEGER' },
  { name: 'discount', type: 'REAL' },
  { name: 'avg_rating', type: 'REAL' },
  { name: 'total_ratings', type: 'INTEGER' },
] as const;

export const PRODUCT_TABLE = 'product';

export type ProductColumn = (typeof PRODUCT_COLUMNS)[number]['name'];

export const PRODUCT_TABLE_DDL = `CREATE TABLE IF NOT EXISTS ${PRODUCT_TABLE} (
${PRODUCT_COLUMNS.map((c) => `  ${c.name} ${c.type}`).join(',\n')}
)`;

/**
 * Schema block embedded in the SQL generation prompt
 */
export function describeProductSchema(): string {
  return [
    '<schema>',
    `table: ${PRODUCT_TABLE}`,
    '',
    'columns:',
    ...PRODUCT_COLUMNS.map((c) => `- ${c.name} (${c.type})`),
    '</schema>',
  ].join('\n');
}
