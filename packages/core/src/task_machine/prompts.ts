/**
 * Coding agent prompts, one per agent step. Human feedback collected at the
 * preceding checkpoint is appended as a directive block.
 */

import type { CodingAgentStep } from '../coding_agent/coding_agent';

export type PromptContext = {
  description: string;
  plan?: string;
  reviewNotes?: string;
  filesTouched?: string[];
  /** Output of FeedbackRelay.formatForAgent, or empty */
  feedbackBlock?: string;
};

function withFeedback(prompt: string, feedbackBlock: string | undefined): string {
  return feedbackBlock ? `${prompt}\n\n${feedbackBlock}` : prompt;
}

function fileList(files: string[] | undefined): string {
  if (!files || files.length === 0) return '(none recorded)';
  return files.map(file => `- ${file}`).join('\n');
}

export function buildPrompt(step: CodingAgentStep, context: PromptContext): string {
  switch (step) {
    case 'plan':
      return withFeedback(
        [
          `Task: ${context.description}`,
          '',
          'Explore the repository and write a short, numbered implementation plan for this task.',
          'Do not modify any files yet.',
          'Also return a concise pull request title (at most 72 characters).',
        ].join('\n'),
        context.feedbackBlock,
      );

    case 'implement':
      return withFeedback(
        [
          `Task: ${context.description}`,
          '',
          'Implementation plan:',
          context.plan ?? '(no plan recorded)',
          '',
          'Apply the plan to the checked-out branch. Keep the change focused on the task.',
        ].join('\n'),
        context.feedbackBlock,
      );

    case 'review':
      return withFeedback(
        [
          `Task: ${context.description}`,
          '',
          'Files changed so far:',
          fileList(context.filesTouched),
          '',
          'Review your own changes critically: correctness, edge cases, security and readability.',
          'Fix what you find. Then list only the areas a human reviewer should look at closely.',
        ].join('\n'),
        context.feedbackBlock,
      );

    case 'test':
      return withFeedback(
        [
          `Task: ${context.description}`,
          '',
          'Files changed so far:',
          fileList(context.filesTouched),
          '',
          'Write or update tests covering the change, run them, and report whether they pass.',
        ].join('\n'),
        context.feedbackBlock,
      );
  }
}
