import WebSocket from 'ws';
import logger from '../logger';
import { CONFIG } from '../config';
import { TimeoutError } from '../net/timeout';

export interface WebSocketFetchOptions {
  messages?: number;
  timeoutMs?: number;
  headers?: Record<string, string>;
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf-8');
  return data.toString('utf-8');
}

/**
 * Connect, read exactly `messages` frames, close. The frames are joined by
 * newlines. Any error, early close or timeout yields `null`.
 */
export function fetchWebSocket(url: string, opts?: WebSocketFetchOptions): Promise<Buffer | null> {
  const wanted = opts?.messages ?? CONFIG.WS.MESSAGES;
  const timeoutMs = opts?.timeoutMs ?? CONFIG.WS.TIMEOUT_MS;

  return new Promise((resolve) => {
    const frames: string[] = [];
    let done = false;

    const ws = new WebSocket(url, {
      headers: { 'User-Agent': CONFIG.USER_AGENT, ...(opts?.headers ?? {}) },
      handshakeTimeout: timeoutMs,
    });

    const finish = (payload: Buffer | null, err?: unknown) => {
      if (done) return;
      done = true;
      clearTimeout(timer);
      if (err) logger.warn({ err, url, received: frames.length }, 'websocket source failed');
      if (payload) ws.close();
      else ws.terminate();
      resolve(payload);
    };

    const timer = setTimeout(() => finish(null, new TimeoutError(timeoutMs)), timeoutMs);

    ws.on('message', (data) => {
      frames.push(rawDataToString(data));
      if (frames.length >= wanted) finish(Buffer.from(frames.join('\n'), 'utf-8'));
    });
    ws.on('error', (err) => finish(null, err));
    ws.on('close', (code) => finish(null, new Error(`closed with ${code} after ${frames.length} of ${wanted} messages`)));
  });
}
