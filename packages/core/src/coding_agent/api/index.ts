export { ApiCodingAgent } from './api_coding_agent';
export type { ApiCodingAgentOptions } from './api_coding_agent';
