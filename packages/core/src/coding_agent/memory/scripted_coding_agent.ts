/**
 * ScriptedCodingAgent - CodingAgent double driven by per-step scripts
 *
 * Each step answers with a fixed result, a function of the request, or an
 * error to throw. Queued one-off answers (`queue`) take precedence over
 * the script. Every request is recorded.
 *
 * @example
 * ```typescript
 * const agent = new ScriptedCodingAgent({
 *   plan: { summary: '1. Add toggle', title: 'Add dark mode' },
 *   implement: () => { workspace.touch('src/theme.ts'); return { summary: 'done' }; },
 * });
 * agent.queue('test', new Error('socket hang up'));
 * ```
 */

import type { CodingAgent, CodingAgentRequest, CodingAgentResult, CodingAgentStep } from '../coding_agent';

export type ScriptedAnswer =
  | CodingAgentResult
  | Error
  | ((request: CodingAgentRequest) => CodingAgentResult | Promise<CodingAgentResult>);

export type CodingAgentScript = Partial<Record<CodingAgentStep, ScriptedAnswer>>;

export class ScriptedCodingAgent implements CodingAgent {
  private readonly script: CodingAgentScript;
  private readonly queued: Array<{ step: CodingAgentStep; answer: ScriptedAnswer }> = [];
  private readonly requests: CodingAgentRequest[] = [];

  constructor(script: CodingAgentScript = {}) {
    this.script = script;
  }

  async run(request: CodingAgentRequest): Promise<CodingAgentResult> {
    this.requests.push(request);
    const answer = this.takeQueued(request.step) ?? this.script[request.step] ?? { summary: '' };

    if (answer instanceof Error) {
      throw answer;
    }
    if (typeof answer === 'function') {
      return answer(request);
    }
    return answer;
  }

  // ==================== Test Helper Methods ====================

  /**
   * Answer the next `step` call with `answer`, once.
   */
  queue(step: CodingAgentStep, answer: ScriptedAnswer): void {
    this.queued.push({ step, answer });
  }

  getRequests(step?: CodingAgentStep): CodingAgentRequest[] {
    return step ? this.requests.filter(request => request.step === step) : [...this.requests];
  }

  // ==================== PRIVATE HELPERS ====================

  private takeQueued(step: CodingAgentStep): ScriptedAnswer | undefined {
    const index = this.queued.findIndex(entry => entry.step === step);
    if (index === -1) return undefined;
    return this.queued.splice(index, 1)[0]?.answer;
  }
}
