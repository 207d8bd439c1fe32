import { workflowConfigSchema } from '../contracts/workflow.contract.js';
import type { WorkflowConfig } from '../types/workflow.js';
import { exists, readJsonFile } from '../utils/fs.js';
import { DocPublishError, validationError } from './error-codes.js';
import { isLogLevel, setLogLevel } from './logger.js';

export async function loadWorkflowConfig(filePath: string): Promise<WorkflowConfig> {
  const raw = (await exists(filePath)) ? await readJsonFile(filePath) : {};
  const parsed = workflowConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw validationError('Invalid workflow config', parsed.error);
  }
  return parsed.data;
}

export function applyLogLevelFromEnv(env: NodeJS.ProcessEnv = process.env): void {
  const value = env.DOC_PUBLISH_LOG_LEVEL;
  if (value === undefined || value === '') {
    return;
  }
  if (!isLogLevel(value)) {
    throw new DocPublishError('E_USAGE', `Unsupported DOC_PUBLISH_LOG_LEVEL: ${value}`);
  }
  setLogLevel(value);
}
