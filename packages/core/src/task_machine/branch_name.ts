import { BranchNameExhaustedError } from './errors';

const MAX_SLUG_LENGTH = 40;
const MAX_BRANCH_ATTEMPTS = 10;

/**
 * Lowercase, dash-separated, ASCII-only slug of free text.
 */
export function slugify(text: string, maxLength: number = MAX_SLUG_LENGTH): string {
  return text
    .toLowerCase()
    .replace(/[\s/_.]+/g, '-')
    .replace(/[^a-z0-9-]/g, '')
    .replace(/-+/g, '-')
    .replace(/^-|-$/g, '')
    .slice(0, maxLength)
    .replace(/-$/, '');
}

/**
 * `{agent}/{slug}`; descriptions with no usable characters fall back to
 * the thread timestamp.
 */
export function createBranchName(agentName: string, description: string, threadTs: string): string {
  const slug = slugify(description) || `task-${threadTs.replace(/\./g, '-')}`;
  return `${agentName}/${slug}`;
}

/**
 * The subset of `git check-ref-format --branch` rules a generated name
 * can break.
 */
export function isValidBranchName(name: string): boolean {
  if (name.length === 0 || name.length > 255) return false;
  if (name.startsWith('/') || name.endsWith('/') || name.startsWith('-')) return false;
  if (name.endsWith('.') || name.endsWith('.lock')) return false;
  if (name.includes('..') || name.includes('//') || name.includes('@{') || name === '@') return false;
  if (/[\x00-\x20\x7f~^:?*[\\]/.test(name)) return false;
  return name.split('/').every(component => !component.startsWith('.'));
}

/**
 * First of `base`, `base-2`, ..., `base-10` that does not exist yet.
 */
export async function resolveUniqueBranchName(
  base: string,
  exists: (name: string) => Promise<boolean>,
  maxAttempts: number = MAX_BRANCH_ATTEMPTS,
): Promise<string> {
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const candidate = attempt === 1 ? base : `${base}-${attempt}`;
    if (!(await exists(candidate))) {
      return candidate;
    }
  }
  throw new BranchNameExhaustedError(base, maxAttempts);
}
