import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import type { Server } from 'http';
import { Logger } from '../src/lib/logger';
import { createApp, startServer } from './app';

let server: Server;
let baseUrl = '';

beforeAll(async () => {
  const app = createApp({ corsOrigins: ['http://localhost:5173'] });
  server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Expected a TCP address');
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
});

function postScene(body: unknown): Promise<Response> {
  return fetch(`${baseUrl}/api/compile`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

const scene = {
  canvas: { width: 1280, height: 720, frameRate: 30 },
  duration: 5,
  background: { kind: 'color', color: 'black' },
  layers: [
    {
      name: 'talent',
      source: {
        foreground: {
          encoding: 'native-alpha',
          path: 'talent.webm',
          codec: 'vp9',
          width: 1280,
          height: 720,
          frameRate: 30,
        },
      },
    },
  ],
  encoder: 'h264',
  output: { path: 'out.mp4' },
};

describe('GET /health', () => {
  it('reports the server as up', async () => {
    const response = await fetch(`${baseUrl}/health`);
    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ status: 'ok' });
  });
});

describe('POST /api/compile', () => {
  it('returns the inspected program', async () => {
    const response = await postScene(scene);
    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      success: true,
      program: {
        canvas: { width: 1280, height: 720, frameRate: '30' },
        maps: { video: 'vout', audio: null },
        duration: 5,
        output: { kind: 'file', path: 'out.mp4' },
        encoder: { name: 'h264' },
      },
    });
  });

  it('lists schema issues for malformed documents', async () => {
    const response = await postScene({ ...scene, encoder: 'mpeg2' });
    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({
      success: false,
      error: 'Invalid scene document',
      issues: [{ path: 'encoder' }],
    });
  });

  it('rejects scenes that cannot be compiled', async () => {
    const response = await postScene({ ...scene, background: { kind: 'transparent' } });
    expect(response.status).toBe(422);
    expect(await response.json()).toMatchObject({ success: false, kind: 'configuration' });
  });
});

describe('GET /api/profiles', () => {
  it('lists every built-in profile', async () => {
    const response = await fetch(`${baseUrl}/api/profiles`);
    expect(await response.json()).toMatchObject({
      success: true,
      profiles: [
        { name: 'h264' },
        { name: 'h265' },
        { name: 'vp9' },
        { name: 'transparent-webm' },
        { name: 'prores-4444' },
        { name: 'png-sequence' },
        { name: 'yuv4mpeg' },
      ],
    });
  });
});

describe('startServer', () => {
  it('reports the bound address through the server logger', async () => {
    const info = vi.spyOn(Logger.prototype, 'info');
    const started = await startServer({ port: 0, host: '127.0.0.1', corsOrigins: ['http://localhost:5173'] });
    const address = started.address();
    await new Promise<void>((resolve, reject) => {
      started.close((error) => (error ? reject(error) : resolve()));
    });

    if (address === null || typeof address === 'string') {
      throw new Error('Expected a TCP address');
    }
    expect(info.mock.calls).toEqual([
      [`Running on http://127.0.0.1:${address.port}`],
      [`Health check: http://127.0.0.1:${address.port}/health`],
    ]);
    info.mockRestore();
  });
});
