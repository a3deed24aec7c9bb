import { z } from 'zod';
import { CandidateDraft, SourceType } from '../../core/entities/CandidateRecord.js';
import { EntityProfile } from '../../core/entities/EntityProfile.js';
import { StrategyId } from '../../core/entities/Strategy.js';
import { ResearchStrategy, StrategyContext, StrategyResult } from '../../core/interfaces/IStrategy.js';
import { PermanentClientError, describeError } from '../../core/errors.js';
import { HttpClient } from '../http/HttpClient.js';
import { Logger, createLogger } from '../../utils/logger.js';

export interface FetchOptions {
  /** Rate-limiter bucket; defaults to the strategy's own */
  targetKey?: string;
  headers?: Record<string, string>;
  cacheTtlMs?: number;
}

/**
 * What `collect` gets for one run: a counted, cached, rate-limited GET
 */
export interface StrategyRun {
  fetchText(url: string, options?: FetchOptions): Promise<string>;
  /** Note a non-fatal problem; a run with warnings is reported as partial */
  warn(message: string): void;
}

/**
 * Shared plumbing for strategies that read public HTTP sources.
 *
 * Subclasses implement `collect` and throw on fatal problems; the base turns
 * that into a StrategyResult with the request count.
 */
export abstract class BaseHttpStrategy implements ResearchStrategy {
  abstract readonly id: StrategyId;
  abstract readonly displayName: string;
  abstract readonly sourceType: SourceType;
  abstract readonly targetKey: string;

  protected readonly log: Logger;

  constructor(protected readonly http: HttpClient, scope: string) {
    this.log = createLogger(scope);
  }

  protected abstract collect(profile: EntityProfile, run: StrategyRun): Promise<CandidateDraft[]>;

  async execute(profile: EntityProfile, context: StrategyContext): Promise<StrategyResult> {
    let requestsMade = 0;
    const warnings: string[] = [];

    const run: StrategyRun = {
      fetchText: (url, options = {}) =>
        this.http.getText(url, context, {
          targetKey: options.targetKey ?? this.targetKey,
          headers: options.headers,
          cacheTtlMs: options.cacheTtlMs,
          onRequest: () => {
            requestsMade++;
          },
        }),
      warn: (message) => {
        warnings.push(message);
        this.log.warn(message);
      },
    };

    try {
      const records = await this.collect(profile, run);
      this.log.info(`Collected ${records.length} record(s) for "${profile.targetIdentity}" in ${requestsMade} request(s)`);
      if (warnings.length > 0) {
        return { status: 'partial', records, requestsMade, error: warnings.join('; ') };
      }
      return { status: 'success', records, requestsMade };
    } catch (error) {
      this.log.warn(`Failed for "${profile.targetIdentity}": ${describeError(error)}`);
      return { status: 'failed', records: [], requestsMade, error: describeError(error), cause: error };
    }
  }
}

/**
 * `https://` is assumed when the scheme is missing
 */
export function toUrl(website: string): URL | null {
  try {
    return new URL(/^https?:\/\//i.test(website) ? website : `https://${website}`);
  } catch {
    return null;
  }
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Parse and validate a JSON body; malformed payloads are permanent failures
 */
export function parseJsonBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, text: string, label: string): T {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new PermanentClientError(`${label}: response is not JSON (${describeError(error)})`);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new PermanentClientError(`${label}: unexpected response shape (${parsed.error.issues[0]?.message ?? 'invalid'})`);
  }
  return parsed.data;
}
