import type { EventContext, EventType } from '../types/event.js';
import type { TriggerConfig } from '../types/workflow.js';

export function shouldTrigger(event: EventContext, on: TriggerConfig): boolean {
  if (event.type === 'pull_request') {
    return on.pullRequest;
  }
  return event.branch !== '' && on.push.branches.includes(event.branch);
}

export function shouldPublish(eventType: EventType, branch: string, publishBranch: string): boolean {
  return eventType === 'push' && branch === publishBranch;
}
