import { strFromU8, unzipSync } from 'fflate';
import { z } from 'zod';

import type { ToolFactory, ToolSpec } from '../../core/types.js';
import { formatRepositoryRef } from '../../repo/repository-ref.js';

import { createGithubApi, repoPath, type GithubApi } from './api.js';
import { truncateText } from './base64.js';
import { parsePayload } from './raw.js';
import {
  IdSchema,
  clamp,
  optionalFilter,
  repositoryTargetShape,
  resolveTarget,
  toIdString,
} from './target.js';

const RawRunSchema = z
  .object({
    id: z.number(),
    name: z.string().nullish(),
    display_title: z.string().nullish(),
    event: z.string().nullish(),
    status: z.string().nullish(),
    conclusion: z.string().nullish(),
    created_at: z.string().nullish(),
    updated_at: z.string().nullish(),
    run_number: z.number().nullish(),
    run_attempt: z.number().nullish(),
    head_branch: z.string().nullish(),
    head_sha: z.string().nullish(),
    html_url: z.string().nullish(),
  })
  .passthrough();

const RawRunListSchema = z
  .object({
    total_count: z.number().nullish(),
    workflow_runs: z.array(RawRunSchema).nullish(),
  })
  .passthrough();

const RawStepSchema = z
  .object({
    name: z.string().nullish(),
    status: z.string().nullish(),
    conclusion: z.string().nullish(),
    number: z.number().nullish(),
    started_at: z.string().nullish(),
    completed_at: z.string().nullish(),
  })
  .passthrough();

const RawJobSchema = z
  .object({
    id: z.number(),
    name: z.string().nullish(),
    status: z.string().nullish(),
    conclusion: z.string().nullish(),
    started_at: z.string().nullish(),
    completed_at: z.string().nullish(),
    runner_name: z.string().nullish(),
    labels: z.array(z.string()).nullish(),
    steps: z.array(RawStepSchema).nullish(),
  })
  .passthrough();

const RawJobListSchema = z
  .object({ jobs: z.array(RawJobSchema).nullish() })
  .passthrough();

type RawRun = z.infer<typeof RawRunSchema>;
type RawJob = z.infer<typeof RawJobSchema>;
type RawStep = z.infer<typeof RawStepSchema>;

const mapRun = (run: RawRun) => ({
  id: run.id,
  name: run.name ?? null,
  display_title: run.display_title ?? null,
  event: run.event ?? null,
  status: run.status ?? null,
  conclusion: run.conclusion ?? null,
  created_at: run.created_at ?? null,
  updated_at: run.updated_at ?? null,
  run_number: run.run_number ?? null,
  head_branch: run.head_branch ?? null,
  head_sha: run.head_sha ?? null,
  html_url: run.html_url ?? null,
});

const mapStep = (step: RawStep) => ({
  name: step.name ?? null,
  status: step.status ?? null,
  conclusion: step.conclusion ?? null,
  number: step.number ?? null,
  started_at: step.started_at ?? null,
  completed_at: step.completed_at ?? null,
});

type JobSummary = Readonly<{
  jobs_count: number;
  jobs_returned: number;
  steps_returned: number;
  truncated: boolean;
  items: ReadonlyArray<ReturnType<typeof mapJob>>;
}>;

const mapJob = (job: RawJob, steps: readonly RawStep[]) => ({
  id: job.id,
  name: job.name ?? null,
  status: job.status ?? null,
  conclusion: job.conclusion ?? null,
  started_at: job.started_at ?? null,
  completed_at: job.completed_at ?? null,
  runner_name: job.runner_name ?? null,
  labels: job.labels ?? [],
  steps: steps.map(mapStep),
});

/**
 * Summarize jobs under two caps: at most `maxJobs` jobs and `maxSteps` steps
 * in total. Once the step budget is spent no further jobs are listed.
 */
export const summarizeJobs = (
  jobs: readonly RawJob[],
  maxJobs: number,
  maxSteps: number,
): JobSummary => {
  const items: Array<ReturnType<typeof mapJob>> = [];
  let stepsUsed = 0;
  for (const job of jobs.slice(0, maxJobs)) {
    const budget = Math.max(0, maxSteps - stepsUsed);
    const steps = (job.steps ?? []).slice(0, budget);
    stepsUsed += steps.length;
    items.push(mapJob(job, steps));
    if (stepsUsed >= maxSteps) break;
  }
  return {
    jobs_count: jobs.length,
    jobs_returned: items.length,
    steps_returned: stepsUsed,
    truncated: jobs.length > items.length || stepsUsed >= maxSteps,
    items,
  };
};

const ListRunsInputShape = {
  ...repositoryTargetShape,
  workflow_id: z
    .string()
    .optional()
    .describe('Workflow file name or numeric id, e.g. "ci.yml". Omit for all workflows.'),
  branch: z.string().optional().describe('Only runs for this branch.'),
  status: z
    .string()
    .optional()
    .describe('Run status or conclusion filter, e.g. "completed", "in_progress", "failure".'),
  event: z.string().optional().describe('Triggering event filter, e.g. "push" or "pull_request".'),
  limit: z.number().int().optional().describe('Maximum runs to return (1..100, default 20).'),
} as const;

const ListRunsSchema = z.object(ListRunsInputShape);

export const githubListWorkflowRuns: ToolFactory = (ctx) => {
  const api = createGithubApi(ctx);

  const spec = {
    name: 'github_list_workflow_runs',
    description: 'List recent GitHub Actions workflow runs, optionally for one workflow.',
    inputSchema: ListRunsInputShape,
    stability: 'stable',
    since: '0.1.0',
    examples: [{ args: { workflow_id: 'ci.yml', branch: 'main', limit: 5 } }],
  } satisfies ToolSpec;

  const invoke = async (raw: unknown) => {
    const args = ListRunsSchema.parse(raw ?? {});
    const limit = clamp(args.limit ?? 20, 1, 100);
    const workflowId = optionalFilter(args.workflow_id);
    const { ref } = await resolveTarget({ ctx, args });
    const path = workflowId
      ? repoPath(ref, 'actions', 'workflows', workflowId, 'runs')
      : repoPath(ref, 'actions', 'runs');
    const { data } = await api.get(path, {
      per_page: limit,
      branch: optionalFilter(args.branch),
      status: optionalFilter(args.status),
      event: optionalFilter(args.event),
    });
    const list = parsePayload(RawRunListSchema, data, 'workflow runs');
    const runs = (list.workflow_runs ?? []).slice(0, limit).map(mapRun);
    return {
      repo: formatRepositoryRef(ref),
      workflow_id: workflowId ?? null,
      total_count: list.total_count ?? null,
      count: runs.length,
      runs,
    };
  };

  return { spec, invoke };
};

const GetRunInputShape = {
  run_id: IdSchema.describe('Workflow run id.'),
  ...repositoryTargetShape,
  include_jobs: z.boolean().optional().describe('Include jobs and their steps (default true).'),
  max_jobs: z.number().int().optional().describe('Maximum jobs to include (1..100, default 50).'),
  max_steps: z
    .number()
    .int()
    .optional()
    .describe('Maximum steps across all jobs (1..1000, default 200).'),
} as const;

const GetRunSchema = z.object(GetRunInputShape);

export const githubGetWorkflowRun: ToolFactory = (ctx) => {
  const api = createGithubApi(ctx);

  const spec = {
    name: 'github_get_workflow_run',
    description: 'Get one workflow run, with a summary of its jobs and steps.',
    inputSchema: GetRunInputShape,
    stability: 'stable',
    since: '0.1.0',
    examples: [{ args: { run_id: 123456789, max_steps: 50 } }],
  } satisfies ToolSpec;

  const invoke = async (raw: unknown) => {
    const args = GetRunSchema.parse(raw);
    const runId = toIdString(args.run_id);
    const { ref } = await resolveTarget({ ctx, args });
    const { data } = await api.get(repoPath(ref, 'actions', 'runs', runId));
    const run = parsePayload(RawRunSchema, data, `workflow run ${runId}`);
    const summary = { ...mapRun(run), attempt: run.run_attempt ?? null };
    const repo = formatRepositoryRef(ref);

    if (args.include_jobs === false) {
      return { repo, run: summary };
    }

    const jobsResponse = await api.get(repoPath(ref, 'actions', 'runs', runId, 'jobs'), {
      per_page: 100,
    });
    const jobs = parsePayload(RawJobListSchema, jobsResponse.data, `jobs of run ${runId}`).jobs ?? [];
    return {
      repo,
      run: summary,
      jobs: summarizeJobs(jobs, clamp(args.max_jobs ?? 50, 1, 100), clamp(args.max_steps ?? 200, 1, 1000)),
    };
  };

  return { spec, invoke };
};

// ---------------------------------------------------------------------------
// logs
// ---------------------------------------------------------------------------

export const DEFAULT_LOG_CHARS_PER_FILE = 20_000;

type WorkflowLogFile = Readonly<{
  readonly path: string;
  readonly size: number;
  readonly lineCount: number;
  readonly truncated: boolean;
  readonly content: string;
}>;

type WorkflowLogArchive = Readonly<{
  readonly archiveSize: number;
  readonly fileCount: number;
  readonly files: readonly WorkflowLogFile[];
}>;

const countLines = (content: string): number => {
  if (content.length === 0) {
    return 0;
  }
  const normalized = content.replace(/\r\n/g, '\n');
  return normalized.split('\n').length;
};

const toLogFile = (path: string, bytes: Uint8Array, maxChars: number): WorkflowLogFile => {
  const content = strFromU8(bytes);
  const clipped = truncateText(content, maxChars);
  return {
    path,
    size: bytes.byteLength,
    lineCount: countLines(content),
    truncated: clipped.truncated,
    content: clipped.text,
  };
};

// Zip archives start with "PK\x03\x04"; job logs come back as plain text.
const isZipArchive = (bytes: Uint8Array): boolean =>
  bytes.length >= 4 && bytes[0] === 0x50 && bytes[1] === 0x4b && bytes[2] === 0x03 && bytes[3] === 0x04;

const decodeLogArchive = (
  bytes: Uint8Array,
  fallbackName: string,
  maxChars: number,
): readonly WorkflowLogFile[] => {
  if (!isZipArchive(bytes)) {
    return [toLogFile(fallbackName, bytes, maxChars)];
  }
  try {
    return Object.entries(unzipSync(bytes))
      .filter(([path]) => !path.endsWith('/'))
      .map(([path, entry]) => toLogFile(path, entry, maxChars));
  } catch (error) {
    throw new Error('[github.workflow] Failed to unzip workflow logs archive', { cause: error });
  }
};

type FetchLogsOptions = Readonly<{
  api: GithubApi;
  path: string;
  fallbackName: string;
  maxChars: number;
}>;

const fetchLogArchive = async (options: FetchLogsOptions): Promise<WorkflowLogArchive> => {
  const archive = await options.api.download(options.path);
  const files = decodeLogArchive(archive, options.fallbackName, options.maxChars);
  return {
    archiveSize: archive.byteLength,
    fileCount: files.length,
    files,
  };
};

const logLimitShape = {
  max_chars_per_file: z
    .number()
    .int()
    .positive()
    .optional()
    .describe(`Maximum characters kept per log file (default ${DEFAULT_LOG_CHARS_PER_FILE}).`),
} as const;

export const githubWorkflowGetRunLogs: ToolFactory = (ctx) => {
  const api = createGithubApi(ctx);
  const shape = {
    run_id: IdSchema.describe('Workflow run id.'),
    ...repositoryTargetShape,
    ...logLimitShape,
  } as const;
  const Schema = z.object(shape);

  return {
    spec: {
      name: 'github_workflow_get_run_logs',
      description: 'Download and extract the log files for a GitHub Actions workflow run.',
      inputSchema: Schema.shape,
      stability: 'experimental',
      since: '0.1.0',
    } satisfies ToolSpec,
    invoke: async (raw: unknown) => {
      const args = Schema.parse(raw);
      const runId = toIdString(args.run_id);
      const { ref } = await resolveTarget({ ctx, args });
      const archive = await fetchLogArchive({
        api,
        path: repoPath(ref, 'actions', 'runs', runId, 'logs'),
        fallbackName: `run-${runId}.txt`,
        maxChars: args.max_chars_per_file ?? DEFAULT_LOG_CHARS_PER_FILE,
      });
      return { repo: formatRepositoryRef(ref), run_id: runId, ...archive };
    },
  };
};

export const githubWorkflowGetJobLogs: ToolFactory = (ctx) => {
  const api = createGithubApi(ctx);
  const shape = {
    job_id: IdSchema.describe('Workflow job id.'),
    ...repositoryTargetShape,
    ...logLimitShape,
  } as const;
  const Schema = z.object(shape);

  return {
    spec: {
      name: 'github_workflow_get_job_logs',
      description: 'Download the log of a single GitHub Actions workflow job.',
      inputSchema: Schema.shape,
      stability: 'experimental',
      since: '0.1.0',
    } satisfies ToolSpec,
    invoke: async (raw: unknown) => {
      const args = Schema.parse(raw);
      const jobId = toIdString(args.job_id);
      const { ref } = await resolveTarget({ ctx, args });
      const archive = await fetchLogArchive({
        api,
        path: repoPath(ref, 'actions', 'jobs', jobId, 'logs'),
        fallbackName: `job-${jobId}.txt`,
        maxChars: args.max_chars_per_file ?? DEFAULT_LOG_CHARS_PER_FILE,
      });
      return { repo: formatRepositoryRef(ref), job_id: jobId, ...archive };
    },
  };
};
