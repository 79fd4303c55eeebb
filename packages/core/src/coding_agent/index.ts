export type { CodingAgent, CodingAgentRequest, CodingAgentResult, CodingAgentStep } from './coding_agent';
export { CodingAgentError } from './errors';
export { ApiCodingAgent } from './api';
export type { ApiCodingAgentOptions } from './api';
