import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { once } from 'events';
import type { IncomingMessage } from 'http';
import { WebSocketServer, type WebSocket } from 'ws';

vi.mock('../utils/logger.js', () => ({
  createChildLogger: vi.fn(() => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

import { CompletionWatcher, parseExecutedEvent } from './completion-watcher.service.js';
import {
  CompletionCancelledError,
  CompletionTimeoutError,
  UpstreamTransportError,
} from '../utils/errors.js';

type ConnectionHandler = (socket: WebSocket, request: IncomingMessage) => void;

const executed = (promptId: string, images: Array<Record<string, string>>) =>
  JSON.stringify({
    type: 'executed',
    data: { node: '35', prompt_id: promptId, output: { images } },
  });

/**
 * In-process push channel; each test decides what a connecting client receives
 */
async function startServer(onConnection: ConnectionHandler) {
  const server = new WebSocketServer({ host: '127.0.0.1', port: 0 });
  server.on('connection', onConnection);
  await once(server, 'listening');

  const address = server.address();
  if (typeof address === 'string') {
    throw new Error(`Unexpected server address ${address}`);
  }

  const close = async () => {
    for (const client of server.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve) => server.close(() => resolve()));
  };

  return { server, wsBaseUrl: `ws://127.0.0.1:${address.port}`, close };
}

describe('parseExecutedEvent', () => {
  it('should return the executed event of the job', () => {
    const event = parseExecutedEvent(executed('job-1', [{ filename: 'a.png' }]), 'job-1');

    expect(event?.data.output?.images).toEqual([{ filename: 'a.png', subfolder: '', type: 'output' }]);
  });

  it('should ignore events of other jobs', () => {
    expect(parseExecutedEvent(executed('job-2', [{ filename: 'a.png' }]), 'job-1')).toBeNull();
  });

  it('should ignore other event types', () => {
    const progress = JSON.stringify({ type: 'progress', data: { prompt_id: 'job-1', value: 3, max: 20 } });
    const executing = JSON.stringify({ type: 'executing', data: { prompt_id: 'job-1', node: null } });

    expect(parseExecutedEvent(progress, 'job-1')).toBeNull();
    expect(parseExecutedEvent(executing, 'job-1')).toBeNull();
  });

  it('should ignore unparsable frames', () => {
    expect(parseExecutedEvent('{not json', 'job-1')).toBeNull();
  });
});

describe('CompletionWatcher', () => {
  const fetchOutput = vi.fn();
  const writeFinalImage = vi.fn();
  let stopServer: (() => Promise<void>) | undefined;

  const createWatcher = (wsBaseUrl: string, defaultTimeoutMs = 5000) =>
    new CompletionWatcher({
      wsBaseUrl,
      client: { fetchOutput },
      storage: { writeFinalImage },
      defaultTimeoutMs,
    });

  beforeEach(() => {
    fetchOutput.mockReset().mockResolvedValue(Buffer.from('final-png'));
    writeFinalImage.mockReset().mockImplementation(async (filename: string) => `/final/${filename}`);
  });

  afterEach(async () => {
    await stopServer?.();
    stopServer = undefined;
  });

  it('should connect with the client id and store the first image of the job', async () => {
    const requestUrls: string[] = [];
    const serverSideClosed: Array<Promise<unknown>> = [];
    const { wsBaseUrl, close } = await startServer((socket, request) => {
      requestUrls.push(request.url ?? '');
      serverSideClosed.push(once(socket, 'close'));
      socket.send(executed('job-1', [
        { filename: 'merged_output_00001_.png', subfolder: '', type: 'output' },
        { filename: 'merged_output_00002_.png', subfolder: '', type: 'output' },
      ]));
    });
    stopServer = close;

    const filename = await createWatcher(wsBaseUrl).awaitCompletion('job-1', 'client-1');

    expect(filename).toBe('merged_output_00001_.png');
    expect(requestUrls).toEqual(['/ws?clientId=client-1']);
    expect(fetchOutput).toHaveBeenCalledTimes(1);
    expect(fetchOutput).toHaveBeenCalledWith({
      filename: 'merged_output_00001_.png',
      subfolder: '',
      type: 'output',
    });
    expect(writeFinalImage).toHaveBeenCalledWith('merged_output_00001_.png', Buffer.from('final-png'));

    await Promise.all(serverSideClosed);
  });

  it('should keep waiting through binary, malformed and unrelated frames', async () => {
    const { wsBaseUrl, close } = await startServer((socket) => {
      socket.send(Buffer.from([1, 2, 3, 4]), { binary: true });
      socket.send('not json at all');
      socket.send(JSON.stringify({ type: 'status', data: { status: { exec_info: { queue_remaining: 1 } } } }));
      socket.send(JSON.stringify({ type: 'progress', data: { prompt_id: 'job-1', value: 10, max: 20 } }));
      socket.send(JSON.stringify({ type: 'executing', data: { prompt_id: 'job-1', node: '35' } }));
      socket.send(executed('job-other', [{ filename: 'someone_else.png' }]));
      socket.send(executed('job-1', [{ filename: 'mine.png', subfolder: 'sub', type: 'output' }]));
    });
    stopServer = close;

    const filename = await createWatcher(wsBaseUrl).awaitCompletion('job-1', 'client-1');

    expect(filename).toBe('mine.png');
    expect(fetchOutput).toHaveBeenCalledTimes(1);
    expect(fetchOutput).toHaveBeenCalledWith({ filename: 'mine.png', subfolder: 'sub', type: 'output' });
  });

  it('should never complete on events of other jobs', async () => {
    const { wsBaseUrl, close } = await startServer((socket) => {
      socket.send(executed('job-other', [{ filename: 'someone_else.png' }]));
      socket.send(JSON.stringify({ type: 'executing', data: { prompt_id: 'job-1', node: null } }));
    });
    stopServer = close;

    const error = await createWatcher(wsBaseUrl)
      .awaitCompletion('job-1', 'client-1', { timeoutMs: 150 })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CompletionTimeoutError);
    expect(error).toHaveProperty('timeoutMs', 150);
    expect(error).toHaveProperty('jobId', 'job-1');
    expect(fetchOutput).not.toHaveBeenCalled();
  });

  it('should return null when the job produced no images', async () => {
    const { wsBaseUrl, close } = await startServer((socket) => {
      socket.send(executed('job-1', []));
    });
    stopServer = close;

    await expect(createWatcher(wsBaseUrl).awaitCompletion('job-1', 'client-1')).resolves.toBeNull();
    expect(fetchOutput).not.toHaveBeenCalled();
    expect(writeFinalImage).not.toHaveBeenCalled();
  });

  it('should return null when the executed event has no output', async () => {
    const { wsBaseUrl, close } = await startServer((socket) => {
      socket.send(JSON.stringify({ type: 'executed', data: { prompt_id: 'job-1', node: '35', output: null } }));
    });
    stopServer = close;

    await expect(createWatcher(wsBaseUrl).awaitCompletion('job-1', 'client-1')).resolves.toBeNull();
  });

  it('should use the default deadline when no override is given', async () => {
    const { wsBaseUrl, close } = await startServer(() => undefined);
    stopServer = close;

    const error = await createWatcher(wsBaseUrl, 100)
      .awaitCompletion('job-1', 'client-1')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CompletionTimeoutError);
    expect(error).toHaveProperty('statusCode', 504);
    expect(error).toHaveProperty('message', 'ComfyUI: No completion event for job job-1 within 100ms');
  });

  it('should stop waiting when the signal aborts', async () => {
    const controller = new AbortController();
    const { wsBaseUrl, close } = await startServer(() => {
      controller.abort();
    });
    stopServer = close;

    const error = await createWatcher(wsBaseUrl)
      .awaitCompletion('job-1', 'client-1', { signal: controller.signal })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CompletionCancelledError);
    expect(error).toHaveProperty('statusCode', 503);
  });

  it('should reject immediately for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      createWatcher('ws://127.0.0.1:9').awaitCompletion('job-1', 'client-1', { signal: controller.signal })
    ).rejects.toBeInstanceOf(CompletionCancelledError);
  });

  it('should fail when the server closes the connection first', async () => {
    const { wsBaseUrl, close } = await startServer((socket) => {
      socket.close(1001, 'going away');
    });
    stopServer = close;

    const error = await createWatcher(wsBaseUrl)
      .awaitCompletion('job-1', 'client-1')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpstreamTransportError);
    expect(error).toHaveProperty('message', 'ComfyUI: WebSocket closed before job job-1 completed (code 1001)');
  });

  it('should fail when the service is unreachable', async () => {
    const { wsBaseUrl, close } = await startServer(() => undefined);
    await close();

    await expect(createWatcher(wsBaseUrl).awaitCompletion('job-1', 'client-1')).rejects.toBeInstanceOf(
      UpstreamTransportError
    );
  });

  it('should propagate output download failures', async () => {
    fetchOutput.mockRejectedValueOnce(new UpstreamTransportError('ComfyUI', 'HTTP 404 from /view: ', { status: 404 }));
    const { wsBaseUrl, close } = await startServer((socket) => {
      socket.send(executed('job-1', [{ filename: 'gone.png' }]));
    });
    stopServer = close;

    await expect(createWatcher(wsBaseUrl).awaitCompletion('job-1', 'client-1')).rejects.toBeInstanceOf(
      UpstreamTransportError
    );
    expect(writeFinalImage).not.toHaveBeenCalled();
  });
});
