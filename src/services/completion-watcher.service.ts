/**
 * Completion Watcher
 *
 * Listens on the generation service's push channel until the `executed` event of
 * one job arrives, then downloads the first produced image into local storage.
 */

import WebSocket, { type RawData } from 'ws';

import { createChildLogger } from '../utils/logger.js';
import {
  CompletionCancelledError,
  CompletionTimeoutError,
  UpstreamTransportError,
} from '../utils/errors.js';
import {
  executedEventSchema,
  type ExecutedEvent,
  type OutputImageReference,
} from '../types/generation.types.js';
import { GENERATION_SERVICE, type GenerationClient } from './generation-client.service.js';
import type { LocalImageStorage } from './local-storage.service.js';

const logger = createChildLogger({ service: 'completion-watcher' });

export interface CompletionWatcherDeps {
  wsBaseUrl: string;
  client: Pick<GenerationClient, 'fetchOutput'>;
  storage: Pick<LocalImageStorage, 'writeFinalImage'>;
  defaultTimeoutMs: number;
}

export interface AwaitCompletionOptions {
  /** Overrides the default deadline for this wait */
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Parse a text frame; returns the event only if it is the `executed` event of `jobId`
 */
export function parseExecutedEvent(text: string, jobId: string): ExecutedEvent | null {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch {
    logger.debug({ jobId, frame: text.slice(0, 200) }, 'Ignoring unparsable frame');
    return null;
  }

  const parsed = executedEventSchema.safeParse(payload);
  if (!parsed.success || parsed.data.data.prompt_id !== jobId) {
    return null;
  }
  return parsed.data;
}

function frameText(raw: RawData): string {
  if (Array.isArray(raw)) {
    return Buffer.concat(raw).toString('utf8');
  }
  if (raw instanceof ArrayBuffer) {
    return Buffer.from(raw).toString('utf8');
  }
  return raw.toString('utf8');
}

export class CompletionWatcher {
  constructor(private readonly deps: CompletionWatcherDeps) {}

  /**
   * Block until `jobId` finishes; returns the stored filename, or null if the job
   * produced no images
   */
  async awaitCompletion(
    jobId: string,
    clientId: string,
    options: AwaitCompletionOptions = {}
  ): Promise<string | null> {
    const event = await this.waitForExecuted(jobId, clientId, options);
    const images = event.data.output?.images ?? [];

    if (images.length === 0) {
      logger.warn({ jobId, node: event.data.node }, 'Job finished without output images');
      return null;
    }

    const [reference] = images;
    if (images.length > 1) {
      logger.debug({ jobId, count: images.length, kept: reference.filename }, 'Extra output images dropped');
    }

    return this.storeOutput(jobId, reference);
  }

  private async storeOutput(jobId: string, reference: OutputImageReference): Promise<string> {
    const data = await this.deps.client.fetchOutput(reference);
    await this.deps.storage.writeFinalImage(reference.filename, data);
    logger.info({ jobId, filename: reference.filename, size: data.length }, 'Final image stored');
    return reference.filename;
  }

  private waitForExecuted(
    jobId: string,
    clientId: string,
    options: AwaitCompletionOptions
  ): Promise<ExecutedEvent> {
    const timeoutMs = options.timeoutMs ?? this.deps.defaultTimeoutMs;
    const { signal } = options;

    if (signal?.aborted) {
      return Promise.reject(new CompletionCancelledError(GENERATION_SERVICE, jobId));
    }

    const url = `${this.deps.wsBaseUrl}/ws?clientId=${encodeURIComponent(clientId)}`;

    return new Promise<ExecutedEvent>((resolve, reject) => {
      const socket = new WebSocket(url);
      let settled = false;

      const finish = (settle: () => void): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        if (socket.readyState !== WebSocket.CLOSED && socket.readyState !== WebSocket.CLOSING) {
          socket.close();
        }
        settle();
      };

      const timer = setTimeout(() => {
        logger.warn({ jobId, timeoutMs }, 'Timed out waiting for completion event');
        finish(() => reject(new CompletionTimeoutError(GENERATION_SERVICE, jobId, timeoutMs)));
      }, timeoutMs);

      const onAbort = (): void => {
        logger.info({ jobId }, 'Completion wait cancelled');
        finish(() => reject(new CompletionCancelledError(GENERATION_SERVICE, jobId)));
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      socket.on('open', () => {
        logger.debug({ jobId, clientId }, 'Listening for completion events');
      });

      // Stays attached after settling: closing a socket that is still connecting emits an error
      socket.on('error', (error) => {
        finish(() =>
          reject(
            new UpstreamTransportError(GENERATION_SERVICE, `WebSocket error: ${error.message}`, {
              originalError: error,
            })
          )
        );
      });

      socket.on('close', (code) => {
        finish(() =>
          reject(
            new UpstreamTransportError(
              GENERATION_SERVICE,
              `WebSocket closed before job ${jobId} completed (code ${code})`
            )
          )
        );
      });

      socket.on('message', (raw, isBinary) => {
        // Binary frames carry preview images
        if (isBinary) return;

        const event = parseExecutedEvent(frameText(raw), jobId);
        if (event) {
          finish(() => resolve(event));
        }
      });
    });
  }
}
