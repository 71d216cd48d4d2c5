/**
 * Merge Pipeline
 *
 * Composite → persist → upload asset → submit job → await completion → publish.
 * Each stage starts only after the previous one succeeded. Upstream failures are
 * reported as outcomes; anything else (decode errors, disk errors, a broken
 * workflow template) is thrown to the caller.
 */

import { randomUUID } from 'crypto';

import { createChildLogger } from '../utils/logger.js';
import {
  CompletionCancelledError,
  CompletionTimeoutError,
  UpstreamProtocolError,
  UpstreamTransportError,
} from '../utils/errors.js';
import { PipelineTimer } from '../utils/timer.js';
import { timestampSource, type TimestampSource } from '../utils/timestamp.js';
import type { CompositorService, ImageInput } from './compositor.service.js';
import type { LocalImageStorage } from './local-storage.service.js';
import type { GenerationClient } from './generation-client.service.js';
import type { JobDescriptorService } from './job-descriptor.service.js';
import type { CompletionWatcher } from './completion-watcher.service.js';
import type { Publisher } from './publisher.service.js';

const logger = createChildLogger({ service: 'merge-pipeline' });

export interface MergeInput {
  foreground: ImageInput;
  background: ImageInput;
}

export interface MergeRunOptions {
  /** Aborts the completion wait (server shutdown) */
  signal?: AbortSignal;
  /** Correlates pipeline logs with the HTTP request */
  requestId?: string;
}

export type MergeOutcome =
  | { status: 'completed'; finalImageFilename: string; finalImageUrl: string }
  | { status: 'asset_upload_failed'; details: string }
  | { status: 'job_submission_failed'; details: string }
  | { status: 'output_missing'; details?: string }
  | { status: 'completion_timeout'; timeoutMs: number }
  | { status: 'cancelled' }
  | { status: 'publish_failed'; finalImageFilename: string; ftpErrorDetails: string }
  | { status: 'public_url_missing'; finalImageFilename: string };

export type MergeStatus = MergeOutcome['status'];

export interface MergePipelineDeps {
  compositor: Pick<CompositorService, 'composite'>;
  storage: Pick<LocalImageStorage, 'writeMergedImage' | 'readMergedImage' | 'finalImagePath'>;
  client: Pick<GenerationClient, 'submitAsset' | 'submitJob'>;
  jobDescriptors: Pick<JobDescriptorService, 'build'>;
  watcher: Pick<CompletionWatcher, 'awaitCompletion'>;
  publisher: Pick<Publisher, 'publish'>;
  /** Prefix for generated outputs; the request timestamp is appended */
  outputPrefix: string;
  /** Public location of published files; the filename is appended verbatim */
  publicBaseUrl?: string;
  timestamps?: Pick<TimestampSource, 'next'>;
  createClientId?: () => string;
}

function isUpstreamError(error: unknown): error is UpstreamTransportError | UpstreamProtocolError {
  return error instanceof UpstreamTransportError || error instanceof UpstreamProtocolError;
}

export class MergePipeline {
  private readonly timestamps: Pick<TimestampSource, 'next'>;
  private readonly createClientId: () => string;

  constructor(private readonly deps: MergePipelineDeps) {
    this.timestamps = deps.timestamps ?? timestampSource;
    this.createClientId = deps.createClientId ?? randomUUID;
  }

  async run(input: MergeInput, options: MergeRunOptions = {}): Promise<MergeOutcome> {
    const clientId = this.createClientId();
    const requestId = options.requestId ?? clientId;
    const timer = new PipelineTimer(requestId, { logPrefix: '[MERGE]' });
    let outcome: MergeOutcome | undefined;

    try {
      outcome = await this.execute(input, clientId, requestId, timer, options.signal);
      return outcome;
    } finally {
      timer.logSummary(outcome?.status ?? 'error');
    }
  }

  private async execute(
    input: MergeInput,
    clientId: string,
    requestId: string,
    timer: PipelineTimer,
    signal: AbortSignal | undefined
  ): Promise<MergeOutcome> {
    const { compositor, storage, client, jobDescriptors, watcher, publisher } = this.deps;
    const timestamp = this.timestamps.next();
    const mergedFilename = `merged_result_${timestamp}.png`;
    const outputPrefix = `${this.deps.outputPrefix}_${timestamp}`;

    const composite = await timer.timeStep('composite', () =>
      compositor.composite(input.foreground, input.background)
    );

    const mergedImage = await timer.timeStep('persist_composite', async () => {
      await storage.writeMergedImage(mergedFilename, composite.image);
      return storage.readMergedImage(mergedFilename);
    });

    let assetName: string;
    try {
      assetName = await timer.timeStep('upload_asset', () => client.submitAsset(mergedImage, mergedFilename));
    } catch (error) {
      if (!isUpstreamError(error)) throw error;
      logger.error({ requestId, error: error.message }, 'Failed to upload merged image');
      return { status: 'asset_upload_failed', details: error.message };
    }

    const descriptor = await jobDescriptors.build({ assetName, outputPrefix });

    let jobId: string;
    try {
      jobId = await timer.timeStep('submit_job', () => client.submitJob(descriptor, clientId));
    } catch (error) {
      if (!isUpstreamError(error)) throw error;
      logger.error({ requestId, error: error.message }, 'Failed to queue job');
      return { status: 'job_submission_failed', details: error.message };
    }

    logger.info({ requestId, jobId, clientId, assetName, outputPrefix }, 'Waiting for job completion');

    let completion: string | null;
    try {
      completion = await timer.timeStep('await_completion', () =>
        watcher.awaitCompletion(jobId, clientId, { signal })
      );
    } catch (error) {
      if (error instanceof CompletionTimeoutError) {
        return { status: 'completion_timeout', timeoutMs: error.timeoutMs };
      }
      if (error instanceof CompletionCancelledError) {
        return { status: 'cancelled' };
      }
      if (!isUpstreamError(error)) throw error;
      logger.error({ requestId, jobId, error: error.message }, 'Could not retrieve final image');
      return { status: 'output_missing', details: error.message };
    }

    if (!completion) {
      logger.error({ requestId, jobId }, 'Job completed without an output image');
      return { status: 'output_missing' };
    }

    const finalImageFilename = completion;

    const publishResult = await timer.timeStep('publish', () =>
      publisher.publish(storage.finalImagePath(finalImageFilename), finalImageFilename)
    );
    if (!publishResult.ok) {
      return { status: 'publish_failed', finalImageFilename, ftpErrorDetails: publishResult.message };
    }

    if (!this.deps.publicBaseUrl) {
      logger.error({ requestId, finalImageFilename }, 'BASE_PUBLIC_URL is not configured');
      return { status: 'public_url_missing', finalImageFilename };
    }

    const finalImageUrl = `${this.deps.publicBaseUrl}${finalImageFilename}`;
    logger.info({ requestId, jobId, finalImageUrl }, 'Merge workflow complete');
    return { status: 'completed', finalImageFilename, finalImageUrl };
  }
}
