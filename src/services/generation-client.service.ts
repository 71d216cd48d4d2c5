/**
 * Generation Client
 *
 * HTTP side of a ComfyUI-compatible generation service: asset upload, job
 * submission and output download. No retries; every call either returns a
 * typed value or throws an upstream error for the pipeline to classify.
 */

import type { z } from 'zod';

import { createChildLogger } from '../utils/logger.js';
import { UpstreamProtocolError, UpstreamTransportError } from '../utils/errors.js';
import {
  queuePromptResponseSchema,
  uploadImageResponseSchema,
  type JobDescriptor,
  type OutputImageReference,
} from '../types/generation.types.js';

const logger = createChildLogger({ service: 'generation-client' });

export const GENERATION_SERVICE = 'ComfyUI';

export interface GenerationEndpoints {
  /** e.g. http://127.0.0.1:8188 */
  httpBaseUrl: string;
  /** e.g. ws://127.0.0.1:8188 */
  wsBaseUrl: string;
}

/**
 * Derive HTTP and WebSocket base URLs from a host[:port]
 */
export function buildGenerationEndpoints(host: string, secure: boolean): GenerationEndpoints {
  return {
    httpBaseUrl: `${secure ? 'https' : 'http'}://${host}`,
    wsBaseUrl: `${secure ? 'wss' : 'ws'}://${host}`,
  };
}

export class GenerationClient {
  constructor(private readonly httpBaseUrl: string) {}

  /**
   * Upload an image the job descriptor can reference; returns the stored name
   */
  async submitAsset(data: Buffer, filename: string): Promise<string> {
    const formData = new FormData();
    formData.append('image', new Blob([new Uint8Array(data)], { type: 'image/png' }), filename);
    formData.append('overwrite', 'true');

    const response = await this.request('/upload/image', { method: 'POST', body: formData });
    const body = await this.parseJson(response, uploadImageResponseSchema, 'upload/image');

    logger.info({ filename, assetName: body.name }, 'Asset uploaded to generation service');
    return body.name;
  }

  /**
   * Queue a job; returns the job id used to correlate completion events
   */
  async submitJob(descriptor: JobDescriptor, clientId: string): Promise<string> {
    const response = await this.request('/prompt', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ prompt: descriptor, client_id: clientId }),
    });
    const body = await this.parseJson(response, queuePromptResponseSchema, 'prompt');

    logger.info({ jobId: body.prompt_id, clientId, queuePosition: body.number }, 'Job queued');
    return body.prompt_id;
  }

  /**
   * Download a produced image
   */
  async fetchOutput(reference: OutputImageReference): Promise<Buffer> {
    const query = new URLSearchParams({
      filename: reference.filename,
      subfolder: reference.subfolder,
      type: reference.type,
    });

    const response = await this.request(`/view?${query.toString()}`, { method: 'GET' });

    try {
      const data = Buffer.from(await response.arrayBuffer());
      logger.debug({ filename: reference.filename, size: data.length }, 'Output image fetched');
      return data;
    } catch (error) {
      throw new UpstreamTransportError(GENERATION_SERVICE, `Failed to read /view body: ${errorMessage(error)}`, {
        originalError: error instanceof Error ? error : undefined,
      });
    }
  }

  private async request(pathAndQuery: string, init: RequestInit): Promise<Response> {
    const url = `${this.httpBaseUrl}${pathAndQuery}`;
    let response: Response;

    try {
      response = await fetch(url, init);
    } catch (error) {
      logger.error({ url, error: errorMessage(error) }, 'Generation service request failed');
      throw new UpstreamTransportError(GENERATION_SERVICE, `Request to ${pathAndQuery} failed: ${errorMessage(error)}`, {
        originalError: error instanceof Error ? error : undefined,
      });
    }

    if (!response.ok) {
      let details: string;
      try {
        details = (await response.text()).slice(0, 500);
      } catch {
        details = `HTTP ${response.status}`;
      }
      logger.error({ url, status: response.status, details }, 'Generation service returned an error');
      throw new UpstreamTransportError(
        GENERATION_SERVICE,
        `HTTP ${response.status} from ${pathAndQuery.split('?')[0]}: ${details}`,
        { status: response.status }
      );
    }

    return response;
  }

  private async parseJson<T extends z.ZodTypeAny>(
    response: Response,
    schema: T,
    endpoint: string
  ): Promise<z.infer<T>> {
    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new UpstreamProtocolError(
        GENERATION_SERVICE,
        `Invalid JSON from /${endpoint}`,
        error instanceof Error ? error : undefined
      );
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      logger.warn({ endpoint, issues: parsed.error.issues }, 'Unexpected generation service response');
      throw new UpstreamProtocolError(
        GENERATION_SERVICE,
        `Unexpected response from /${endpoint}: ${parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'} ${i.message}`).join('; ')}`
      );
    }
    return parsed.data;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
