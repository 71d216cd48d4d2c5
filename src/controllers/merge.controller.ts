import type { MergeOutcome } from '../services/merge-pipeline.service.js';

export interface MergeSuccessBody {
  message: string;
  final_image_url: string;
}

export interface MergeErrorBody {
  error: string;
  details?: string;
  timeout_ms?: number;
  final_image_filename?: string;
}

export interface PublishFailedBody {
  message: string;
  error: string;
  final_image_filename: string;
  ftp_error_details: string;
}

export type MergeResponseBody = MergeSuccessBody | MergeErrorBody | PublishFailedBody;

export interface MergeHttpResult {
  statusCode: number;
  body: MergeResponseBody;
}

/**
 * Map a pipeline outcome to the HTTP response the client sees
 */
export function toHttpResult(outcome: MergeOutcome): MergeHttpResult {
  switch (outcome.status) {
    case 'completed':
      return {
        statusCode: 200,
        body: {
          message: 'Workflow complete. File uploaded successfully.',
          final_image_url: outcome.finalImageUrl,
        },
      };

    case 'asset_upload_failed':
      return {
        statusCode: 500,
        body: { error: 'Failed to upload merge image', details: outcome.details },
      };

    case 'job_submission_failed':
      return {
        statusCode: 500,
        body: { error: 'Failed to queue prompt', details: outcome.details },
      };

    case 'output_missing': {
      const body: MergeErrorBody = { error: 'Workflow completed but could not retrieve final image' };
      if (outcome.details) {
        body.details = outcome.details;
      }
      return { statusCode: 500, body };
    }

    case 'completion_timeout':
      return {
        statusCode: 504,
        body: { error: 'Timed out waiting for final image', timeout_ms: outcome.timeoutMs },
      };

    case 'cancelled':
      return {
        statusCode: 503,
        body: { error: 'Request cancelled while waiting for final image' },
      };

    case 'publish_failed':
      return {
        statusCode: 500,
        body: {
          message: 'Workflow completed, but failed to upload image to FTP server.',
          error: 'Could not upload the final image via FTP.',
          final_image_filename: outcome.finalImageFilename,
          ftp_error_details: outcome.ftpErrorDetails,
        },
      };

    case 'public_url_missing':
      return {
        statusCode: 500,
        body: {
          error: 'BASE_PUBLIC_URL is not configured',
          final_image_filename: outcome.finalImageFilename,
        },
      };
  }
}
