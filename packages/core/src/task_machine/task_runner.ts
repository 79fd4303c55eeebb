/**
 * TaskRunner - drives one task from QUEUED to a terminal phase
 *
 * The lifecycle itself is the pure `transition` function; the runner
 * feeds it events and performs the effects it returns against the
 * collaborators. Phase bodies are never interrupted: cancellation and
 * feedback are only observed at the checkpoint that follows each phase.
 *
 * Every path ends with the agent released exactly once, a terminal progress
 * snapshot written, the thread released for the next task and the
 * workspace disposed.
 *
 * @example
 * ```typescript
 * const runner = new TaskRunner({ codingAgent, workspaces, publisher, chat, relay, cancellation, registry });
 * const outcome = await runner.run(message);
 * // outcome.phase: 'READY' | 'FAILED' | 'CANCELLED'
 * ```
 */

import type { AgentRef } from '../agent_registry/agent_registry.types';
import type { CodingAgentResult, CodingAgentStep } from '../coding_agent/coding_agent';
import type { ThreadRef } from '../chat/chat_notifier';
import type { TaskMessage } from '../task_queue/task_queue.types';
import type { FeedbackMessage } from '../feedback_relay/feedback_relay.types';
import type { CancellationInfo, PartialReport } from '../cancellation/cancellation.types';
import type { RepoWorkspace } from '../workspace/workspace';
import type { PullRequestRef } from '../pull_request/pull_request_publisher';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import { sleep as defaultSleep } from '../utils/sleep';
import type { Sleep } from '../utils/sleep';
import { isTerminalPhase, isWorkPhase } from './phases';
import { createInitialState, transition } from './transitions';
import { withRetry, DEFAULT_RETRY_DELAYS_MS } from './retry';
import { buildPrompt } from './prompts';
import {
  InvalidBranchNameError,
  NoChangesProducedError,
  classifyError,
  humanizeError,
} from './errors';
import { isValidBranchName, resolveUniqueBranchName } from './branch_name';
import {
  cancelledPullRequestBody,
  draftOpenedText,
  draftPullRequestBody,
  fallbackTitle,
  feedbackAcknowledgedText,
  finalPullRequestBody,
  taskCancelledText,
  taskCompletedText,
  taskFailedText,
} from './reports';
import type { RequestContext } from './reports';
import type {
  TaskEffect,
  TaskEvent,
  TaskMachineState,
  TaskOutcome,
  TaskResultSummary,
  TaskRunnerDependencies,
  WorkPhase,
} from './task_machine.types';

const AGENT_STEPS: Partial<Record<WorkPhase, CodingAgentStep>> = {
  PLANNING: 'plan',
  IMPLEMENTING: 'implement',
  SELF_REVIEW: 'review',
  TESTING: 'test',
};

export class TaskRunner {
  private readonly deps: TaskRunnerDependencies;
  private readonly logger: Logger;

  constructor(deps: TaskRunnerDependencies) {
    this.deps = deps;
    this.logger = deps.logger ?? createLogger('[TaskRunner] ');
  }

  async run(message: TaskMessage): Promise<TaskOutcome> {
    return new TaskExecution(this.deps, this.logger, message).execute();
  }
}

/**
 * State of a single `run` call.
 */
class TaskExecution {
  private state: TaskMachineState;
  private readonly effects: TaskEffect[] = [];
  private readonly agent: AgentRef;
  private readonly thread: ThreadRef;
  private readonly request: RequestContext;
  private readonly startedAt: number;
  private readonly baseBranch: string;
  private readonly delaysMs: readonly number[];
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private workspace: RepoWorkspace | undefined;
  private report: PartialReport | undefined;
  private released = false;

  constructor(
    private readonly deps: TaskRunnerDependencies,
    private readonly logger: Logger,
    private readonly message: TaskMessage,
  ) {
    this.state = createInitialState(message.branch_name);
    this.agent = {
      name: message.agent_name,
      displayName: message.agent_display_name,
      email: message.agent_email,
      credentialRef: deps.registry.findAgent(message.agent_name)?.credentialRef,
    };
    this.thread = { channelId: message.channel_id, threadTs: message.thread_ts };
    this.request = {
      description: message.task_description,
      requesterName: message.requester_name,
      requesterProfileUrl: message.requester_profile_url,
      startTime: message.start_time,
    };
    this.startedAt = message.start_time * 1000;
    this.baseBranch = deps.baseBranch ?? 'main';
    this.delaysMs = deps.retryDelaysMs ?? DEFAULT_RETRY_DELAYS_MS;
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? Date.now;
  }

  private get taskId(): string {
    return this.message.task_id;
  }

  async execute(): Promise<TaskOutcome> {
    this.logger.info(`Starting ${this.taskId} as ${this.agent.name}`);
    try {
      this.apply({ type: 'start' });
      let effect = this.effects.shift();
      while (effect) {
        await this.perform(effect);
        effect = this.effects.shift();
      }
    } catch (error) {
      await this.abort(error);
    } finally {
      await this.releaseAgent();
      await this.finish();
      await this.disposeWorkspace();
    }
    return this.outcome();
  }

  // ==================== State Machine ====================

  private apply(event: TaskEvent): void {
    const from = this.state.phase;
    const result = transition(this.state, event);
    this.state = result.state;
    this.effects.push(...result.effects);

    if (from !== this.state.phase) {
      this.logger.debug(`${this.taskId}: ${from} -> ${this.state.phase}`);
      this.deps.eventBus?.publish({
        type: 'task.phase.changed',
        timestamp: this.now(),
        source: 'task_runner',
        payload: { taskId: this.taskId, from, to: this.state.phase },
      });
    }
  }

  private async perform(effect: TaskEffect): Promise<void> {
    switch (effect.type) {
      case 'runPhase':
        return this.runPhase(effect.phase, effect.feedback);
      case 'checkpoint':
        return this.checkpoint(effect.next);
      case 'acknowledgeFeedback':
        return this.postSafely(feedbackAcknowledgedText(effect.messages.length), 'speech_balloon');
      case 'publishCancellation':
        return this.publishCancellation(effect.completed, effect.cancellation);
      case 'notifyFailure':
        return this.notifyFailure(effect.failure.phase, effect.failure.reason);
      case 'notifyReady':
        return this.notifyReady();
      case 'releaseAgent':
        return this.releaseAgent();
    }
  }

  private async runPhase(phase: WorkPhase, feedback: FeedbackMessage[]): Promise<void> {
    let patch: Partial<TaskResultSummary>;
    try {
      patch = await this.runPhaseBody(phase, feedback);
    } catch (error) {
      const kind = classifyError(error);
      const reason = humanizeError(error);
      this.logger.error(`${this.taskId} failed in ${phase} (${kind}): ${reason}`);
      this.apply({ type: 'phase_failed', phase, kind, reason });
      return;
    }

    this.apply({ type: 'phase_succeeded', phase, patch });
    await this.recordProgress();
  }

  private async checkpoint(next: WorkPhase): Promise<void> {
    const cancellation = await this.retrying('cancellation check', () =>
      this.deps.cancellation.isCancelled(this.taskId),
    );
    const feedback = cancellation
      ? []
      : await this.retrying('feedback check', () => this.deps.relay.peekNew(this.taskId));

    if (cancellation) {
      this.logger.info(`${this.taskId} cancelled by ${cancellation.actorName} before ${next}`);
    } else if (feedback.length > 0) {
      this.logger.info(`${this.taskId} received ${feedback.length} feedback message(s) before ${next}`);
    }
    this.apply({ type: 'checkpoint', next, cancellation, feedback });
  }

  // ==================== Phase Bodies ====================

  private async runPhaseBody(phase: WorkPhase, feedback: FeedbackMessage[]): Promise<Partial<TaskResultSummary>> {
    const summary = this.state.summary;

    switch (phase) {
      case 'PLANNING': {
        const result = await this.invokeAgent(phase, feedback);
        return {
          plan: result.summary,
          title: result.title?.trim() || fallbackTitle(this.message.task_description),
        };
      }

      case 'DRAFT_OPENED':
        return this.openDraft();

      case 'IMPLEMENTING': {
        const result = await this.invokeAgent(phase, feedback);
        const files = await this.requireWorkspace().modifiedFiles();
        if (result.noChanges || files.length === 0) {
          throw new NoChangesProducedError();
        }
        return { filesTouched: files };
      }

      case 'SELF_REVIEW': {
        const result = await this.invokeAgent(phase, feedback);
        return { reviewNotes: result.summary, filesTouched: await this.requireWorkspace().modifiedFiles() };
      }

      case 'TESTING': {
        const result = await this.invokeAgent(phase, feedback);
        return {
          testsPassed: result.testsPassed,
          testSummary: result.summary,
          filesTouched: await this.requireWorkspace().modifiedFiles(),
        };
      }

      case 'FINALIZING': {
        const workspace = this.requireWorkspace();
        const pullRequest = this.requirePullRequest();
        const title = summary.title ?? fallbackTitle(this.message.task_description);

        await workspace.commitAll(title, this.author());
        await this.retrying('push', () => workspace.push(summary.branchName));

        const files = await workspace.modifiedFiles();
        const transcript = await this.retrying('feedback transcript', () => this.deps.relay.renderForPr(this.taskId));
        const body = finalPullRequestBody(
          this.request,
          { ...summary, filesTouched: files },
          this.elapsedMs(),
          transcript,
        );
        await this.retrying('pull request update', () => this.deps.publisher.updateBody(pullRequest, body));
        await this.retrying('mark ready', () => this.deps.publisher.markReady(pullRequest));
        return { filesTouched: files };
      }
    }
  }

  private async openDraft(): Promise<Partial<TaskResultSummary>> {
    const summary = this.state.summary;
    if (!isValidBranchName(summary.branchName)) {
      throw new InvalidBranchNameError(summary.branchName);
    }

    const branchName = await resolveUniqueBranchName(summary.branchName, name =>
      this.retrying('branch lookup', () => this.deps.publisher.branchExists(name)),
    );
    const title = summary.title ?? fallbackTitle(this.message.task_description);
    const plan = summary.plan ?? '';

    const workspace = this.requireWorkspace();
    await workspace.checkoutBranch(branchName, this.baseBranch);
    await workspace.commitAll(`Start: ${title}`, this.author(), { allowEmpty: true });
    await this.retrying('push', () => workspace.push(branchName));

    const pullRequest = await this.retrying('draft pull request', () =>
      this.deps.publisher.createDraft(branchName, title, draftPullRequestBody(this.request, plan)),
    );
    await this.postSafely(draftOpenedText(this.agent.name, title, pullRequest.url, plan), 'clipboard');
    return { branchName, pullRequest };
  }

  private async invokeAgent(phase: WorkPhase, feedback: FeedbackMessage[]): Promise<CodingAgentResult> {
    const step = AGENT_STEPS[phase];
    if (!step) {
      throw new Error(`${phase} does not invoke the coding agent`);
    }
    if (!this.workspace) {
      this.workspace = await this.retrying('workspace', () => this.deps.workspaces.create(this.taskId));
    }

    const summary = this.state.summary;
    const prompt = buildPrompt(step, {
      description: this.message.task_description,
      plan: summary.plan,
      reviewNotes: summary.reviewNotes,
      filesTouched: summary.filesTouched,
      feedbackBlock: feedback.length > 0 ? this.deps.relay.formatForAgent(feedback) : '',
    });

    const workspacePath = this.workspace.path;
    return this.retrying(`coding agent ${step}`, () =>
      this.deps.codingAgent.run({
        taskId: this.taskId,
        step,
        prompt,
        branchName: summary.branchName,
        agent: this.agent,
        workspacePath,
      }),
    );
  }

  // ==================== Terminal Effects ====================

  private async publishCancellation(completed: WorkPhase[], cancellation: CancellationInfo): Promise<void> {
    const report = this.deps.cancellation.buildPartialReport(completed, cancellation, this.startedAt, this.now());
    this.report = report;
    const pullRequest = this.state.summary.pullRequest;

    if (pullRequest) {
      const body = cancelledPullRequestBody(this.request, this.state.summary, report);
      try {
        await this.retrying('cancellation notice', () => this.deps.publisher.updateBody(pullRequest, body));
      } catch (error) {
        this.logger.error(`Could not record cancellation on ${pullRequest.url}: ${humanizeError(error)}`);
      }
    }

    await this.postSafely(taskCancelledText(this.agent.name, report, pullRequest?.url), 'octagonal_sign');
    this.deps.eventBus?.publish({
      type: 'task.cancelled',
      timestamp: this.now(),
      source: 'task_runner',
      payload: {
        taskId: this.taskId,
        agentName: this.agent.name,
        cancelledBy: report.cancelledBy,
        completedPhases: report.completed,
      },
    });
  }

  private async notifyFailure(phase: WorkPhase, reason: string): Promise<void> {
    await this.postSafely(taskFailedText(reason), 'x');
    await this.clearCancellation();
    this.deps.eventBus?.publish({
      type: 'task.failed',
      timestamp: this.now(),
      source: 'task_runner',
      payload: { taskId: this.taskId, agentName: this.agent.name, phase, reason },
    });
  }

  private async notifyReady(): Promise<void> {
    const pullRequest = this.requirePullRequest();
    const title = this.state.summary.title ?? fallbackTitle(this.message.task_description);
    await this.postSafely(taskCompletedText(this.agent.name, title, pullRequest.url), 'white_check_mark');
    await this.clearCancellation();
    this.logger.info(`${this.taskId} ready: ${pullRequest.url}`);
    this.deps.eventBus?.publish({
      type: 'task.ready',
      timestamp: this.now(),
      source: 'task_runner',
      payload: {
        taskId: this.taskId,
        agentName: this.agent.name,
        pullRequestUrl: pullRequest.url,
        durationMs: this.elapsedMs(),
      },
    });
  }

  /**
   * An error escaped the effect loop (a broken collaborator or an invalid
   * transition). Terminalize as FAILED unless the task already finished.
   */
  private async abort(error: unknown): Promise<void> {
    const reason = humanizeError(error);
    this.logger.error(`${this.taskId} aborted in ${this.state.phase}: ${reason}`, error);
    if (isTerminalPhase(this.state.phase)) return;

    const phase: WorkPhase = isWorkPhase(this.state.phase) ? this.state.phase : 'PLANNING';
    const failure = { phase, kind: classifyError(error), reason };
    this.state = { ...this.state, phase: 'FAILED', failure };
    this.effects.length = 0;
    await this.notifyFailure(phase, reason);
  }

  // ==================== PRIVATE HELPERS ====================

  private async releaseAgent(): Promise<void> {
    if (this.released) return;
    this.released = true;
    try {
      await this.deps.registry.markFree(this.agent.name, this.taskId);
    } catch (error) {
      this.logger.error(`Could not release ${this.agent.name} from ${this.taskId}: ${humanizeError(error)}`);
    }
  }

  private async finish(): Promise<void> {
    await this.recordProgress();
    try {
      await this.deps.relay.release(this.taskId);
    } catch (error) {
      this.logger.warn(`Could not release the thread of ${this.taskId}: ${humanizeError(error)}`);
    }
  }

  private async disposeWorkspace(): Promise<void> {
    if (!this.workspace) return;
    try {
      await this.workspace.dispose();
    } catch (error) {
      this.logger.warn(`Could not dispose workspace ${this.workspace.path}: ${humanizeError(error)}`);
    }
  }

  private async clearCancellation(): Promise<void> {
    try {
      await this.deps.cancellation.clear(this.taskId);
    } catch (error) {
      this.logger.warn(`Could not clear cancellation state of ${this.taskId}: ${humanizeError(error)}`);
    }
  }

  private async recordProgress(): Promise<void> {
    try {
      await this.deps.cancellation.recordProgress(this.taskId, {
        phase: this.state.phase,
        completedPhases: [...this.state.completed],
        pullRequestUrl: this.state.summary.pullRequest?.url,
        updatedAt: this.now(),
      });
    } catch (error) {
      this.logger.warn(`Could not record progress of ${this.taskId}: ${humanizeError(error)}`);
    }
  }

  /**
   * Chat is best effort: a failed post is logged and the task carries on.
   */
  private async postSafely(text: string, emoji: string): Promise<void> {
    try {
      await this.deps.chat.post(this.thread, text, { emoji });
    } catch (error) {
      this.logger.warn(`Could not post to thread ${this.thread.threadTs}: ${humanizeError(error)}`);
    }
  }

  private retrying<T>(label: string, operation: () => Promise<T>): Promise<T> {
    return withRetry(operation, {
      delaysMs: this.delaysMs,
      sleep: this.sleep,
      onRetry: (error, retry, delayMs) => {
        this.logger.warn(
          `${this.taskId}: ${label} failed (retry ${retry} in ${delayMs / 1000}s): ${humanizeError(error)}`,
        );
      },
    });
  }

  private requireWorkspace(): RepoWorkspace {
    if (!this.workspace) {
      throw new Error(`${this.taskId} has no workspace`);
    }
    return this.workspace;
  }

  private requirePullRequest(): PullRequestRef {
    const pullRequest = this.state.summary.pullRequest;
    if (!pullRequest) {
      throw new Error(`${this.taskId} has no pull request`);
    }
    return pullRequest;
  }

  private author(): { name: string; email: string } {
    return { name: this.agent.name, email: this.agent.email };
  }

  private elapsedMs(): number {
    return Math.max(0, this.now() - this.startedAt);
  }

  private outcome(): TaskOutcome {
    const phase = this.state.phase;
    const terminal = isTerminalPhase(phase) ? phase : 'FAILED';
    return {
      taskId: this.taskId,
      phase: terminal,
      completedPhases: [...this.state.completed],
      summary: this.state.summary,
      durationMs: this.elapsedMs(),
      failure: this.state.failure,
      report: this.report,
    };
  }
}
