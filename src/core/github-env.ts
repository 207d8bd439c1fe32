import { eventContextSchema, eventTypeSchema } from '../contracts/event.contract.js';
import type { EventContext, EventType } from '../types/event.js';
import { DocPublishError, validationError } from './error-codes.js';

export interface EventInput {
  type: string;
  ref: string;
  headRef?: string;
  sha?: string;
  repository?: string;
  serverUrl?: string;
}

const BRANCH_PREFIX = 'refs/heads/';

export function deriveBranch(type: EventType, ref: string, headRef?: string): string {
  if (type === 'pull_request') {
    if (headRef) {
      return headRef;
    }
    return ref.startsWith(BRANCH_PREFIX) ? ref.slice(BRANCH_PREFIX.length) : ref;
  }
  return ref.startsWith(BRANCH_PREFIX) ? ref.slice(BRANCH_PREFIX.length) : '';
}

export function buildEventContext(input: EventInput): EventContext {
  const type = eventTypeSchema.safeParse(input.type);
  if (!type.success) {
    throw new DocPublishError('E_CONTRACT_VALIDATION', `Unsupported event type: ${input.type}`, {
      supported: eventTypeSchema.options
    });
  }

  if (type.data === 'push' && !input.ref.startsWith('refs/')) {
    throw new DocPublishError('E_USAGE', `Push ref must be a full ref such as refs/heads/<branch>: ${input.ref}`);
  }

  const parsed = eventContextSchema.safeParse({
    type: type.data,
    ref: input.ref,
    branch: deriveBranch(type.data, input.ref, input.headRef),
    sha: input.sha,
    repository: input.repository,
    serverUrl: input.serverUrl
  });
  if (!parsed.success) {
    throw validationError('Invalid event context', parsed.error);
  }
  return parsed.data;
}

function optional(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

/** Reads the event the way a GitHub Actions runner exposes it. */
export function eventContextFromEnv(env: NodeJS.ProcessEnv = process.env): EventContext {
  const type = optional(env.GITHUB_EVENT_NAME);
  const ref = optional(env.GITHUB_REF);
  if (!type || !ref) {
    throw new DocPublishError('E_USAGE', 'GITHUB_EVENT_NAME and GITHUB_REF must be set when using --from-env');
  }

  return buildEventContext({
    type,
    ref,
    headRef: optional(env.GITHUB_HEAD_REF),
    sha: optional(env.GITHUB_SHA),
    repository: optional(env.GITHUB_REPOSITORY),
    serverUrl: optional(env.GITHUB_SERVER_URL)
  });
}
