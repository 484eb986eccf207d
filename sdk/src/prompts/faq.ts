export const FAQ_SYSTEM_PROMPT = 'You are a helpful e-commerce customer service assistant.';

export const FAQ_NO_INFORMATION_MESSAGE =
  "I don't have that specific information, but you can contact our support team for help.";

/**
 * User turn for the FAQ chain: retrieved answers plus the question
 */
export function buildFaqPrompt(question: string, context: string): string {
  return `You are a helpful e-commerce customer service assistant.
Answer the question based ONLY on the provided context.

CONTEXT:
${context}

QUESTION:
${question}

INSTRUCTIONS:
- Answer directly and concisely based on the context
- If the exact answer isn't in the context but related information is, provide that
- If no relevant information is found, say:
  "${FAQ_NO_INFORMATION_MESSAGE}"
- Be friendly and professional
- Keep answers brief (3-4 sentences)`;
}
