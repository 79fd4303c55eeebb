/**
 * ApiCodingAgent - CodingAgent reached over HTTP
 *
 * POSTs the request as JSON and expects a JSON `CodingAgentResult` back.
 * The bearer token comes from the agent's `credentialRef` environment
 * variable, else from `tokenEnv`.
 */

import type { CodingAgent, CodingAgentRequest, CodingAgentResult } from '../coding_agent';
import { CodingAgentError } from '../errors';

export type ApiCodingAgentOptions = {
  url: string;
  /** Fallback environment variable for the bearer token */
  tokenEnv?: string;
  /** Abort the call after this long (default: 30 minutes) */
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
};

const DEFAULT_TIMEOUT_MS = 30 * 60 * 1000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Network error code of a failed fetch. Node reports it on `cause`.
 */
function networkCode(error: unknown): string | undefined {
  if (!(error instanceof Error)) return undefined;
  if (error.name === 'TimeoutError') return 'ETIMEDOUT';
  if ('code' in error && typeof error.code === 'string') return error.code;
  return networkCode(error.cause);
}

export class ApiCodingAgent implements CodingAgent {
  private readonly url: string;
  private readonly tokenEnv: string | undefined;
  private readonly timeoutMs: number;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: ApiCodingAgentOptions) {
    this.url = options.url;
    this.tokenEnv = options.tokenEnv;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.env = options.env ?? process.env;
  }

  async run(request: CodingAgentRequest): Promise<CodingAgentResult> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };
    const token = this.resolveToken(request);
    if (token) {
      headers['Authorization'] = `Bearer ${token}`;
    }

    const body = JSON.stringify({
      taskId: request.taskId,
      step: request.step,
      prompt: request.prompt,
      branchName: request.branchName,
      workspacePath: request.workspacePath,
      agent: { name: request.agent.name, email: request.agent.email },
    });

    try {
      const response = await fetch(this.url, {
        method: 'POST',
        headers,
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        throw new CodingAgentError(response.statusText || `HTTP ${response.status}`, {
          statusCode: response.status,
        });
      }

      return this.normalizeOutput(await response.json());
    } catch (error) {
      if (error instanceof CodingAgentError) {
        throw error;
      }
      const code = networkCode(error);
      throw new CodingAgentError(
        error instanceof Error ? error.message : 'Unknown error',
        code === undefined ? {} : { code },
      );
    }
  }

  // ==================== PRIVATE HELPERS ====================

  private resolveToken(request: CodingAgentRequest): string | undefined {
    const perAgent = request.agent.credentialRef ? this.env[request.agent.credentialRef] : undefined;
    if (perAgent) return perAgent;
    return this.tokenEnv ? this.env[this.tokenEnv] : undefined;
  }

  /**
   * Accepts `summary` or, failing that, `message` as the free-text field.
   */
  private normalizeOutput(responseBody: unknown): CodingAgentResult {
    if (!isRecord(responseBody)) {
      throw new CodingAgentError('Response body is not a JSON object');
    }

    const summary = responseBody['summary'] ?? responseBody['message'];
    if (typeof summary !== 'string') {
      throw new CodingAgentError('Response body has no summary');
    }

    const output: CodingAgentResult = { summary };

    const title = responseBody['title'];
    if (typeof title === 'string') {
      output.title = title;
    }

    const files = responseBody['filesTouched'];
    if (Array.isArray(files)) {
      output.filesTouched = files.filter((file): file is string => typeof file === 'string');
    }

    const testsPassed = responseBody['testsPassed'];
    if (typeof testsPassed === 'boolean') {
      output.testsPassed = testsPassed;
    }

    if (responseBody['noChanges'] === true) {
      output.noChanges = true;
    }

    return output;
  }
}
