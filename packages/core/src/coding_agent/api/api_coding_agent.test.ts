/**
 * ApiCodingAgent Tests
 *
 * fetch is replaced globally; no network.
 */

import { ApiCodingAgent } from './api_coding_agent';
import { CodingAgentError } from '../errors';
import type { CodingAgentRequest } from '../coding_agent';

// Mock global fetch
const mockFetch = jest.fn();
global.fetch = mockFetch;

function createRequest(overrides: Partial<CodingAgentRequest> = {}): CodingAgentRequest {
  return {
    taskId: 'C1_1700000000.000100',
    step: 'plan',
    prompt: 'Plan the task',
    branchName: 'rex/add-dark-mode',
    agent: { name: 'rex', displayName: 'Rex', email: 'rex@example.com' },
    ...overrides,
  };
}

function createMockResponse(body: unknown, status = 200, statusText = 'OK'): Response {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    json: async () => body,
  } as Response;
}

function sentInit(): RequestInit {
  const [, init]: [string, RequestInit] = mockFetch.mock.calls[0];
  return init;
}

describe('ApiCodingAgent', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should POST the request as JSON to the configured url', async () => {
    mockFetch.mockResolvedValue(createMockResponse({ summary: 'ok' }));
    const agent = new ApiCodingAgent({ url: 'https://agents.example.test/run', env: {} });

    await agent.run(createRequest({ workspacePath: '/tmp/ws' }));

    expect(mockFetch).toHaveBeenCalledWith(
      'https://agents.example.test/run',
      expect.objectContaining({ method: 'POST', headers: { 'Content-Type': 'application/json' } }),
    );
    expect(JSON.parse(String(sentInit().body))).toEqual({
      taskId: 'C1_1700000000.000100',
      step: 'plan',
      prompt: 'Plan the task',
      branchName: 'rex/add-dark-mode',
      workspacePath: '/tmp/ws',
      agent: { name: 'rex', email: 'rex@example.com' },
    });
  });

  it('should prefer the agent credential over the shared token', async () => {
    mockFetch.mockResolvedValue(createMockResponse({ summary: 'ok' }));
    const agent = new ApiCodingAgent({
      url: 'https://agents.example.test/run',
      tokenEnv: 'AGENT_TOKEN',
      env: { AGENT_TOKEN: 'shared-token', REX_TOKEN: 'test-secret' },
    });

    await agent.run(createRequest({
      agent: { name: 'rex', displayName: 'Rex', email: 'rex@example.com', credentialRef: 'REX_TOKEN' },
    }));

    expect(sentInit().headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-secret',
    });
  });

  it('should fall back to the shared token', async () => {
    mockFetch.mockResolvedValue(createMockResponse({ summary: 'ok' }));
    const agent = new ApiCodingAgent({
      url: 'https://agents.example.test/run',
      tokenEnv: 'AGENT_TOKEN',
      env: { AGENT_TOKEN: 'shared-token' },
    });

    await agent.run(createRequest());

    expect(sentInit().headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer shared-token',
    });
  });

  it('should normalize the response body', async () => {
    mockFetch.mockResolvedValue(createMockResponse({
      message: 'Tests written',
      title: 'Add dark mode',
      filesTouched: ['src/a.ts', 3, 'src/b.ts'],
      testsPassed: false,
      noChanges: 'yes',
    }));
    const agent = new ApiCodingAgent({ url: 'https://agents.example.test/run', env: {} });

    const result = await agent.run(createRequest({ step: 'test' }));

    expect(result).toEqual({
      summary: 'Tests written',
      title: 'Add dark mode',
      filesTouched: ['src/a.ts', 'src/b.ts'],
      testsPassed: false,
    });
  });

  it('should throw CodingAgentError with the status on non-2xx', async () => {
    mockFetch.mockResolvedValue(createMockResponse({}, 503, 'Service Unavailable'));
    const agent = new ApiCodingAgent({ url: 'https://agents.example.test/run', env: {} });

    const error = await agent.run(createRequest()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CodingAgentError);
    expect(error).toMatchObject({ statusCode: 503, message: 'CodingAgentError: Service Unavailable' });
  });

  it('should reject a body without a summary', async () => {
    mockFetch.mockResolvedValue(createMockResponse({ title: 'x' }));
    const agent = new ApiCodingAgent({ url: 'https://agents.example.test/run', env: {} });

    await expect(agent.run(createRequest())).rejects.toThrow('CodingAgentError: Response body has no summary');
  });

  it('should carry the network error code from the fetch cause', async () => {
    const cause = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:80'), { code: 'ECONNREFUSED' });
    mockFetch.mockRejectedValue(new TypeError('fetch failed', { cause }));
    const agent = new ApiCodingAgent({ url: 'https://agents.example.test/run', env: {} });

    await expect(agent.run(createRequest())).rejects.toMatchObject({
      code: 'ECONNREFUSED',
      message: 'CodingAgentError: fetch failed',
    });
  });

  it('should report an aborted call as ETIMEDOUT', async () => {
    const timeout = Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
    mockFetch.mockRejectedValue(timeout);
    const agent = new ApiCodingAgent({ url: 'https://agents.example.test/run', timeoutMs: 5, env: {} });

    await expect(agent.run(createRequest())).rejects.toMatchObject({ code: 'ETIMEDOUT' });
  });
});
