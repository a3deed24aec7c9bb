import { Job, JobStatus } from '../../core/entities/Job.js';
import { MergedEntity } from '../../core/entities/MergedEntity.js';
import { ResearchStatistics } from '../../application/services/ResearchService.js';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export function textResult(text: string): ToolResult {
  return { content: [{ type: 'text', text }] };
}

export function errorResult(prefix: string, error: unknown): ToolResult {
  return {
    isError: true,
    content: [{ type: 'text', text: `${prefix}: ${error instanceof Error ? error.message : String(error)}` }],
  };
}

const STATUS_LABEL: Record<JobStatus, string> = {
  pending: '⏳ pending',
  running: '🔄 running',
  success: '✅ success',
  partial_success: '🟡 partial_success',
  failed: '❌ failed',
};

function json(value: unknown): string {
  return `\`\`\`json\n${JSON.stringify(value, null, 2)}\n\`\`\``;
}

export function formatJob(job: Job, includeReasoning = false): string {
  const sections: string[] = [
    `# Research Job: ${job.id}`,
    `## Status
- **Target**: ${job.targetIdentity} (${job.targetType})
- **Status**: ${STATUS_LABEL[job.status]}
- **Created**: ${job.createdAt.toISOString()}
- **Started**: ${job.startedAt?.toISOString() ?? 'Not yet started'}
- **Completed**: ${job.completedAt?.toISOString() ?? 'In progress'}`,
  ];

  if (job.planned.length > 0) {
    const plan = job.planned.map((p) => {
      const done = job.completed.includes(p.strategyId) ? 'x' : ' ';
      return `- [${done}] ${p.strategyId} (priority ${p.priority}, expected ${p.expectedConfidence}): ${p.rationale}`;
    });
    sections.push(`## Plan\n${plan.join('\n')}`);
  }

  if (job.attempts.length > 0) {
    const attempts = job.attempts.map(
      (a) =>
        `- ${a.strategyId}: ${a.outcome}, ${a.recordCount} record(s), ${a.requestsMade} request(s)` +
        (a.error ? ` (${a.errorKind ?? 'error'}: ${a.error})` : '')
    );
    sections.push(`## Attempts\n${attempts.join('\n')}`);
  }

  if (job.summary) {
    sections.push(`## Summary\n${json(job.summary)}`);
  }

  if (job.errors.length > 0) {
    sections.push(`## Errors\n${job.errors.map((e) => `- [${e.kind}] ${e.strategyId ? `${e.strategyId}: ` : ''}${e.message}`).join('\n')}`);
  }

  if (includeReasoning) {
    const trail = job.reasoning.map((r) => `${r.seq}. [${r.kind}] ${r.outcome}`);
    sections.push(`## Reasoning\n${trail.join('\n') || 'No entries yet'}`);
  }

  return sections.join('\n\n');
}

export function formatJobList(jobs: readonly Job[], stats: ResearchStatistics): string {
  const rows = jobs.map((job) => ({
    id: job.id,
    target: job.targetIdentity,
    type: job.targetType,
    status: job.status,
    createdAt: job.createdAt.toISOString(),
    completedAt: job.completedAt?.toISOString(),
    stopReason: job.summary?.stopReason,
  }));

  return `# Research Jobs

## Statistics
- Pending: ${stats.jobs.pending}
- Running: ${stats.jobs.running}
- Success: ${stats.jobs.success}
- Partial: ${stats.jobs.partial_success}
- Failed: ${stats.jobs.failed}
- Max Concurrent: ${stats.queue.maxConcurrent}

## Jobs
${rows.length === 0 ? 'No jobs found' : json(rows)}`;
}

export function formatEntity(entity: MergedEntity): string {
  const fields = entity.provenance.map(
    (p) => `- **${p.field}**: ${String(p.value)} _(from ${p.sourceType}${p.sourceUrl ? `, ${p.sourceUrl}` : ''})_`
  );

  return `# ${entity.normalizedKey} (${entity.entityType})

- **Completeness**: ${entity.completeness}%
- **Confidence**: ${entity.confidence.toFixed(3)}
- **Source types**: ${entity.sourceCount}
- **Records**: ${entity.records.length}

## Fields
${fields.join('\n') || 'No fields'}`;
}
