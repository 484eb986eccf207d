export { CHITCHAT_SYSTEM_PROMPT } from './chitchat';
export { FAQ_SYSTEM_PROMPT, FAQ_NO_INFORMATION_MESSAGE, buildFaqPrompt } from './faq';
export {
  SQL_GENERATION_PROMPT,
  RESULT_NARRATION_PROMPT,
  NO_PRODUCTS_MESSAGE,
  buildNarrationInput,
} from './sql';
