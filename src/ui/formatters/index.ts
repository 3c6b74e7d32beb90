export { formatAskResult, type AskResultData } from './reply.js';
export { formatSplitConfig } from './config.js';
