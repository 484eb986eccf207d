import { describeProductSchema } from '../sql/productSchema';
import { UNSAFE_SQL_KEYWORDS } from '../sql/sqlSafety';

export const SQL_GENERATION_PROMPT = `You are an expert SQL assistant.

You are given a SQLite database schema and a natural language question.
Generate ONE valid SQLite SQL query.

${describeProductSchema()}

RULES:
- Always use SELECT *
- Brand search must be case-insensitive using LOWER(brand) LIKE LOWER('%value%')
- Never use ILIKE
- Use ORDER BY and LIMIT when the question implies ranking or top results
- Never generate destructive SQL (${UNSAFE_SQL_KEYWORDS.join(', ')})
- Output ONLY the SQL inside <SQL></SQL> tags`;

export const NO_PRODUCTS_MESSAGE = 'No products match your request.';

export const RESULT_NARRATION_PROMPT = `You are an expert in converting structured product data into natural language.

You will receive:
- QUESTION
- DATA (list of products)

RULES:
- Use ONLY the provided data
- Do not mention databases, tables, or queries
- Format each product on a new line as:

1. Product title: Rs. price (discount% off), Rating: rating <product_link>

- If no products exist, say:
"${NO_PRODUCTS_MESSAGE}"`;

export function buildNarrationInput(question: string, data: string): string {
  return `QUESTION: ${question}\nDATA: ${data}`;
}
