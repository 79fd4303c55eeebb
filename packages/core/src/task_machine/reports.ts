/**
 * Pull request bodies and chat texts for each point of the task lifecycle.
 * Plain text and Markdown only.
 */

import type { PartialReport } from '../cancellation/cancellation.types';
import type { TaskResultSummary, TerminalPhase, WorkPhase } from './task_machine.types';

export type RequestContext = {
  description: string;
  requesterName: string;
  requesterProfileUrl: string | null;
  /** Epoch seconds of the original request */
  startTime: number;
};

export const PHASE_LABELS: Readonly<Record<WorkPhase, string>> = {
  PLANNING: 'Planning',
  DRAFT_OPENED: 'Draft pull request',
  IMPLEMENTING: 'Implementation',
  SELF_REVIEW: 'Self-review',
  TESTING: 'Testing',
  FINALIZING: 'Finalizing',
};

const MAX_TITLE_LENGTH = 60;
const MAX_PLAN_PREVIEW_LENGTH = 350;

function plural(count: number, unit: string): string {
  return `${count} ${unit}${count === 1 ? '' : 's'}`;
}

/**
 * "2 minutes and 5 seconds", "1 second".
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes > 0) {
    return `${plural(minutes, 'minute')} and ${plural(seconds, 'second')}`;
  }
  return plural(seconds, 'second');
}

/**
 * "2023-11-14 22:13:20 UTC"
 */
export function formatRequestTime(epochSeconds: number): string {
  return `${new Date(epochSeconds * 1000).toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

export function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

/**
 * Used when the agent returns no title of its own.
 */
export function fallbackTitle(description: string): string {
  return truncate(description.trim(), MAX_TITLE_LENGTH);
}

function requesterLink(context: RequestContext): string {
  return context.requesterProfileUrl
    ? `[${context.requesterName}](${context.requesterProfileUrl})`
    : context.requesterName;
}

function quote(text: string): string {
  return text.split('\n').map(line => `> ${line}`).join('\n');
}

function header(context: RequestContext): string[] {
  return [
    '## Task Report',
    '',
    '### Requester',
    `**${requesterLink(context)}** requested this change`,
    '',
    '### Request',
    quote(context.description),
    '',
    '### When',
    `Requested on **${formatRequestTime(context.startTime)}**`,
    '',
  ];
}

// ==================== Pull Request Bodies ====================

export function draftPullRequestBody(context: RequestContext, plan: string): string {
  return [
    ...header(context),
    '### Implementation Plan',
    plan.trim() || '_No plan was produced._',
    '',
    '---',
    '',
    '**This is a draft pull request.** Implementation is in progress; it will be updated and marked ready for review when complete.',
  ].join('\n');
}

export function finalPullRequestBody(
  context: RequestContext,
  summary: TaskResultSummary,
  durationMs: number,
  feedbackTranscript: string,
): string {
  const lines = [...header(context), '### Implementation Plan', summary.plan?.trim() || '_No plan was produced._', ''];

  lines.push('### Changes Made');
  if (summary.filesTouched.length > 0) {
    lines.push('The following files were modified:', ...summary.filesTouched.map(file => `- \`${file}\``));
  } else {
    lines.push('_No file list was recorded._');
  }
  lines.push('');

  if (summary.reviewNotes?.trim()) {
    lines.push('### Critical Review Areas', summary.reviewNotes.trim(), '');
  }

  lines.push('### Tests');
  if (summary.testsPassed === undefined) {
    lines.push('_No test result was reported._');
  } else {
    lines.push(summary.testsPassed ? 'Tests passed.' : '**Tests failed.**');
  }
  if (summary.testSummary?.trim()) {
    lines.push('', summary.testSummary.trim());
  }
  lines.push('');

  if (feedbackTranscript) {
    lines.push('### Feedback From The Thread', feedbackTranscript, '');
  }

  lines.push('### Task Duration', `Completed in **${formatDuration(durationMs)}**`);
  return lines.join('\n');
}

/**
 * Body left on the draft when a task is cancelled: what was done, what was
 * not, who stopped it and after how long.
 */
export function cancelledPullRequestBody(
  context: RequestContext,
  summary: TaskResultSummary,
  report: PartialReport,
): string {
  return [
    ...header(context),
    '### Implementation Plan',
    summary.plan?.trim() || '_No plan was produced._',
    '',
    '### Cancelled',
    `Cancelled by **${report.cancelledBy}** after ${formatDuration(report.elapsedMs)}.`,
    '',
    'Completed:',
    ...(report.completed.length > 0 ? report.completed.map(phase => `- [x] ${PHASE_LABELS[phase]}`) : ['- (nothing)']),
    '',
    'Not completed:',
    ...(report.notCompleted.length > 0 ? report.notCompleted.map(phase => `- [ ] ${PHASE_LABELS[phase]}`) : ['- (nothing)']),
  ].join('\n');
}

// ==================== Chat Texts ====================

export function taskStartedText(agentName: string, description: string): string {
  return `${agentName} is taking this task!\n\n${description}`;
}

export function draftOpenedText(agentName: string, title: string, url: string, plan: string): string {
  return [
    `${agentName} opened a draft pull request with the plan: ${title}`,
    url,
    '',
    'Plan preview:',
    truncate(plan.trim(), MAX_PLAN_PREVIEW_LENGTH),
    '',
    'Now implementing the changes...',
  ].join('\n');
}

export function feedbackAcknowledgedText(count: number): string {
  return count === 1
    ? 'Got your feedback, folding it into the next step.'
    : `Got ${count} messages of feedback, folding them into the next step.`;
}

export function taskCompletedText(agentName: string, title: string, url: string): string {
  return `Work complete! Pull request ready for review: ${title}\n${url}\n\nCompleted by ${agentName}`;
}

export function taskFailedText(reason: string): string {
  return `Task failed: ${reason}`;
}

export function taskCancelledText(agentName: string, report: PartialReport, pullRequestUrl?: string): string {
  const lines = [`Task cancelled by ${report.cancelledBy}`, ''];
  if (report.completed.length > 0) {
    lines.push(`${agentName} completed: ${report.completed.map(phase => PHASE_LABELS[phase]).join(', ')}`);
  } else {
    lines.push(`${agentName} stopped before making changes.`);
  }
  lines.push(pullRequestUrl ? `Draft pull request with partial progress: ${pullRequestUrl}` : 'No pull request was created.');
  return lines.join('\n');
}

export function queueFailedText(reason: string): string {
  return `Could not start the task: ${reason}`;
}

export function cancellationRequestedText(actorName: string): string {
  return `Cancellation requested by ${actorName}. The task will stop after its current step.`;
}

export function alreadyFinishedText(phase: TerminalPhase): string {
  const outcome = { READY: 'is ready for review', FAILED: 'has failed', CANCELLED: 'was cancelled' }[phase];
  return `Nothing to cancel: this task already ended and ${outcome}.`;
}

export function alreadyWorkingText(): string {
  return 'A task is already running in this thread. Post feedback here, or cancel it first.';
}

export function usageHintText(): string {
  return 'Mention me with a description of the change, e.g. "@leash add rate limiting to /api/login".';
}
