export { BaseChain } from './BaseChain';
export type { BaseChainConfig } from './BaseChain';
export { ChitchatChain, CHITCHAT_ERROR_MESSAGE, getDateTimeInfo } from './ChitchatChain';
export type { ChitchatChainConfig, DateTimeInfo } from './ChitchatChain';
export { FaqChain, FAQ_RETRIEVAL_ERROR_MESSAGE, FAQ_ANSWER_ERROR_MESSAGE } from './FaqChain';
export type { FaqChainConfig } from './FaqChain';
export { SqlChain, SQL_CHAIN_ERROR_MESSAGE } from './SqlChain';
export type { SqlChainConfig } from './SqlChain';
