/**
 * CodingAgent - outbound boundary to the autonomous coding agent
 *
 * One call per agent phase. The agent works inside the task's checked-out
 * workspace; Leash only passes the prompt and reads back a summary.
 */

import type { AgentRef } from '../agent_registry/agent_registry.types';

export type CodingAgentStep = 'plan' | 'implement' | 'review' | 'test';

export type CodingAgentRequest = {
  taskId: string;
  step: CodingAgentStep;
  prompt: string;
  branchName: string;
  agent: AgentRef;
  workspacePath?: string;
};

export type CodingAgentResult = {
  /** Free text: the plan, the review notes or the test report */
  summary: string;
  /** Concise pull request title (plan step) */
  title?: string;
  filesTouched?: string[];
  /** Test outcome (test step) */
  testsPassed?: boolean;
  /** The agent finished without modifying anything */
  noChanges?: boolean;
};

export interface CodingAgent {
  run(request: CodingAgentRequest): Promise<CodingAgentResult>;
}
