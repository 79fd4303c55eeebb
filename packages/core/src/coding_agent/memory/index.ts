export { ScriptedCodingAgent } from './scripted_coding_agent';
export type { CodingAgentScript, ScriptedAnswer } from './scripted_coding_agent';
