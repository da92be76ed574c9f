/**
 * Feed validation: a cheap existence check (HEAD, or ranged GET) for every
 * candidate URL before anyone spends a full body fetch on it.
 */

import type { CandidateUrl, FailureRecord, PipelineStage, ValidatedFeed } from '../types/feed';
import type { HttpClient } from '../utils/httpClient';
import type { WorkerPool } from '../utils/workerPool';
import { FeedPipelineError, NotFoundOrInvalidError, TransientNetworkError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export type ProbeOutcome =
  | { status: 'found'; feed: ValidatedFeed }
  | { status: 'missing'; candidate: CandidateUrl; failure: FailureRecord }
  | { status: 'unknown'; candidate: CandidateUrl; failure: FailureRecord };

export interface ValidationResult {
  valid: ValidatedFeed[];
  validCount: number;
  invalidCount: number;
  failures: FailureRecord[];
}

const log = logger.child('validator');

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

function toFailure(stage: PipelineStage, error: FeedPipelineError): FailureRecord {
  return { stage, kind: error.kind, url: error.url, message: error.message };
}

/**
 * Probe one candidate. Never throws: a non-2xx is `missing`, a network
 * failure is `unknown`.
 */
export async function probeCandidate(
  client: HttpClient,
  candidate: CandidateUrl,
  stage: PipelineStage
): Promise<ProbeOutcome> {
  try {
    const response = await client.probe(candidate.url);
    if (isSuccessStatus(response.status)) {
      return { status: 'found', feed: { ...candidate, status: response.status } };
    }
    const error = new NotFoundOrInvalidError(candidate.url, response.status);
    return { status: 'missing', candidate, failure: toFailure(stage, error) };
  } catch (error) {
    const failure = error instanceof FeedPipelineError
      ? error
      : new TransientNetworkError(errorMessage(error), candidate.url, { cause: error });
    return { status: 'unknown', candidate, failure: toFailure(stage, failure) };
  }
}

/**
 * Check every candidate on the pool and return the ones that exist,
 * in input order. One candidate's failure has no effect on the others.
 */
export async function validateCandidates(
  candidates: readonly CandidateUrl[],
  client: HttpClient,
  pool: WorkerPool
): Promise<ValidationResult> {
  if (candidates.length === 0) {
    return { valid: [], validCount: 0, invalidCount: 0, failures: [] };
  }

  log.info(`Validating ${candidates.length} candidate feeds (pool width ${pool.width})`);

  const outcomes = await pool.map(candidates, candidate =>
    probeCandidate(client, candidate, 'validation')
  );

  const valid: ValidatedFeed[] = [];
  const failures: FailureRecord[] = [];
  for (const outcome of outcomes) {
    if (outcome.status === 'found') {
      valid.push(outcome.feed);
    } else {
      failures.push(outcome.failure);
      if (outcome.status === 'unknown') {
        log.warn(`Could not reach ${outcome.candidate.url}: ${outcome.failure.message}`);
      }
    }
  }

  const result: ValidationResult = {
    valid,
    validCount: valid.length,
    invalidCount: failures.length,
    failures
  };

  log.info(`Validation finished: ${result.validCount} valid, ${result.invalidCount} invalid`);
  return result;
}
