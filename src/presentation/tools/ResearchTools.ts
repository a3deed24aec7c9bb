import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { ENTITY_TYPES } from '../../core/entities/CandidateRecord.js';
import { STRATEGY_IDS } from '../../core/entities/Strategy.js';
import { ResearchService } from '../../application/services/ResearchService.js';
import { errorResult, formatEntity, formatJob, formatJobList, textResult } from './formatters.js';

const JOB_STATUSES = ['pending', 'running', 'success', 'partial_success', 'failed'] as const;

/**
 * Register all research job tools
 */
export function registerResearchTools(server: McpServer, researchService: ResearchService) {
  // start-research-job tool
  server.tool(
    'start-research-job',
    'Queue a research job that collects and merges facts about one company or investor',
    {
      target_identity: z.string().min(1).describe('Name of the entity to research'),
      target_type: z.enum(ENTITY_TYPES).describe('Kind of entity'),
      strategies: z
        .array(z.enum(STRATEGY_IDS))
        .optional()
        .describe('Run exactly these strategies instead of the planned ones (optional)'),
      attributes: z
        .record(z.union([z.string(), z.number(), z.boolean()]))
        .optional()
        .describe('Facts already known, e.g. website, cik, ticker, aum, investorCategory (optional)'),
    },
    async ({ target_identity, target_type, strategies, attributes }) => {
      try {
        const jobId = researchService.startJob({
          targetIdentity: target_identity,
          targetType: target_type,
          strategyOverride: strategies,
          attributes,
        });
        return textResult(`# Research job queued

- **Job ID**: ${jobId}
- **Target**: ${target_identity} (${target_type})

Use \`get-research-job\` with this ID to follow its progress.`);
      } catch (error) {
        return errorResult('Error starting research job', error);
      }
    }
  );

  // get-research-job tool
  server.tool(
    'get-research-job',
    'Get status, plan, attempts and summary of a research job',
    {
      job_id: z.string().describe('The ID of the job to check'),
      include_reasoning: z.boolean().optional().describe('Include the full decision trail (optional)'),
    },
    async ({ job_id, include_reasoning }) => {
      try {
        const job = researchService.getJob(job_id);
        if (!job) {
          return textResult(`Job not found: ${job_id}`);
        }
        return textResult(formatJob(job, include_reasoning ?? false));
      } catch (error) {
        return errorResult('Error getting job', error);
      }
    }
  );

  // get-merged-entity tool
  server.tool(
    'get-merged-entity',
    'Get the merged record for an entity, with the source of every field',
    {
      target_identity: z.string().min(1).describe('Name of the entity'),
      target_type: z.enum(ENTITY_TYPES).optional().describe('Restrict to one kind of entity (optional)'),
    },
    async ({ target_identity, target_type }) => {
      try {
        const entity = researchService.getMergedEntity(target_identity, target_type);
        if (!entity) {
          return textResult(`No merged entity found for "${target_identity}"`);
        }
        return textResult(formatEntity(entity));
      } catch (error) {
        return errorResult('Error getting merged entity', error);
      }
    }
  );

  // list-research-jobs tool
  server.tool(
    'list-research-jobs',
    'List research jobs with their status',
    {
      status: z.enum(JOB_STATUSES).optional().describe('Filter jobs by status (optional)'),
    },
    async ({ status }) => {
      try {
        return textResult(formatJobList(researchService.listJobs(status), researchService.getStatistics()));
      } catch (error) {
        return errorResult('Error listing jobs', error);
      }
    }
  );

  // cancel-research-job tool
  server.tool(
    'cancel-research-job',
    'Cancel a queued or running research job',
    {
      job_id: z.string().describe('The ID of the job to cancel'),
    },
    async ({ job_id }) => {
      try {
        const cancelled = await researchService.cancelJob(job_id);
        return textResult(
          cancelled
            ? `Job ${job_id} cancelled. A running job stops after its in-flight strategies return.`
            : `Job ${job_id} not found or already finished`
        );
      } catch (error) {
        return errorResult('Error cancelling job', error);
      }
    }
  );
}
