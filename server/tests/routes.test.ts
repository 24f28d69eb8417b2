import { afterAll, beforeAll, beforeEach, describe, it, expect } from 'vitest';
import axios, { AxiosInstance } from 'axios';
import { Server } from 'node:http';
import { createApp } from '../src/app.js';
import { createResolutionEngine, ResolutionEngine } from '../src/services/resolution-engine.js';
import { html, StubTransport, testConfig } from './helpers/stub-transport.js';

const PAGE = 'https://trusted.example/movie/x';

describe('stream routes', () => {
    const transport = new StubTransport();
    let engine: ResolutionEngine;
    let server: Server;
    let api: AxiosInstance;

    beforeAll(async () => {
        engine = createResolutionEngine(testConfig(), { client: transport.client() });
        server = await new Promise<Server>((resolve) => {
            const listening = createApp(engine).listen(0, '127.0.0.1', () => resolve(listening));
        });
        const address = server.address();
        const port = typeof address === 'object' && address !== null ? address.port : 0;
        api = axios.create({ baseURL: `http://127.0.0.1:${port}`, validateStatus: () => true, proxy: false });
    });

    afterAll(async () => {
        await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
        await engine.close();
    });

    beforeEach(() => {
        engine.clearCache();
        transport.on(PAGE, { body: html('<video src="/v/film.1080.mp4"></video>') });
        transport.on('https://trusted.example/empty', { body: html('<p>nothing here</p>') });
        transport.on('https://trusted.example/down', { status: 503 });
    });

    it('answers a resolved page with its sources', async () => {
        const response = await api.get('/api/stream/resolve', { params: { url: PAGE } });

        expect(response.status).toBe(200);
        expect(response.headers['x-request-id']).toEqual(expect.any(String));
        expect(response.data).toEqual({
            sources: [{ url: 'https://trusted.example/v/film.1080.mp4', qualityLabel: '1080p' }],
            fromCache: false,
            strategy: 'structured-tag'
        });
    });

    it.each([
        ['https://evil.example/x', 403, { error: 'security-rejected', message: 'Rejected: untrusted host evil.example', retryable: false }],
        ['https://trusted.example/down', 502, { error: 'network-error', message: 'Network error: HTTP 503', retryable: true }],
        ['https://trusted.example/empty', 404, {
            error: 'no-sources',
            message: 'No sources: no playable stream found (tried structured-tag, numbered-mirror-api, embedded-script, iframe-delegation)',
            retryable: false
        }]
    ])('maps %s to HTTP %i', async (url, status, body) => {
        const response = await api.get('/api/stream/resolve', { params: { url } });

        expect(response.status).toBe(status);
        expect(response.data).toEqual(body);
    });

    it('rejects a request without a url', async () => {
        const response = await api.get('/api/stream/resolve', { params: { type: 'movie' } });

        expect(response.status).toBe(400);
        expect(response.data).toEqual({ error: 'bad-request', message: 'url: Required', retryable: false });
    });

    it('rejects an unknown content type', async () => {
        const response = await api.get('/api/stream/resolve', { params: { url: PAGE, type: 'podcast' } });

        expect(response.status).toBe(400);
        expect(response.data.error).toBe('bad-request');
    });

    it('prefetches, reports and invalidates cache entries', async () => {
        const prefetched = await api.post('/api/stream/prefetch', { url: PAGE, type: 'movie' });
        expect(prefetched.data).toEqual({ cached: true });

        const stats = await api.get('/api/stream/cache/stats');
        expect(stats.data).toMatchObject({ entries: 1, totalSources: 1 });

        const resolved = await api.get('/api/stream/resolve', { params: { url: PAGE } });
        expect(resolved.data.fromCache).toBe(true);

        const dropped = await api.delete('/api/stream/cache', { params: { url: PAGE } });
        expect(dropped.data).toEqual({ invalidated: true });

        const again = await api.delete('/api/stream/cache', { params: { url: PAGE } });
        expect(again.data).toEqual({ invalidated: false });
    });

    it('does not report an empty page as cached', async () => {
        const response = await api.post('/api/stream/prefetch', { url: 'https://trusted.example/empty' });

        expect(response.data).toEqual({ cached: false });
    });

    it('serves health with cache statistics', async () => {
        const response = await api.get('/health');

        expect(response.status).toBe(200);
        expect(response.data).toMatchObject({ status: 'healthy', version: '1.0.0', cache: { entries: 0 } });
    });

    it('answers unknown endpoints with 404', async () => {
        const response = await api.get('/api/nothing');

        expect(response.status).toBe(404);
        expect(response.data).toEqual({ error: 'Endpoint not found' });
    });
});
