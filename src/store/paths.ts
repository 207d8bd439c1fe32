import path from 'node:path';

export interface AppPaths {
  rootDir: string;
  dataDir: string;
  jobsDir: string;
  jobIndexFile: string;
  jobIndexLockFile: string;
  workspaceDir: string;
  workflowConfigFile: string;
}

export function resolvePaths(rootDir = process.cwd()): AppPaths {
  const dataDir = path.join(rootDir, 'data');
  const jobsDir = path.join(dataDir, 'jobs');

  return {
    rootDir,
    dataDir,
    jobsDir,
    jobIndexFile: path.join(jobsDir, 'index.json'),
    jobIndexLockFile: path.join(jobsDir, 'index.lock'),
    workspaceDir: path.join(rootDir, 'workspace'),
    workflowConfigFile: path.join(rootDir, 'config', 'workflow.json')
  };
}

export function jobDir(paths: AppPaths, jobId: string): string {
  return path.join(paths.jobsDir, jobId);
}

export function jobFile(paths: AppPaths, jobId: string): string {
  return path.join(jobDir(paths, jobId), 'job.json');
}

export function eventsFile(paths: AppPaths, jobId: string): string {
  return path.join(jobDir(paths, jobId), 'events.ndjson');
}

/** Default checkout directory; one per job so concurrent runs never share a tree. */
export function jobWorkspaceDir(paths: AppPaths, jobId: string): string {
  return path.join(paths.workspaceDir, jobId);
}
