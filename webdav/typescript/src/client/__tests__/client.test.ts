/**
 * Tests for WebDavClient
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Readable } from 'stream';
import { text } from 'stream/consumers';
import { ProtocolError } from '../../errors.js';
import { WebDavConfigBuilder } from '../../config/index.js';
import { InMemoryLogger } from '../../observability/index.js';
import { MockTransport } from '../../simulation/index.js';
import { WebDavClient, createClient } from '../index.js';

describe('WebDavClient', () => {
  let transport: MockTransport;
  let logger: InMemoryLogger;
  let client: WebDavClient;

  beforeEach(() => {
    transport = new MockTransport();
    logger = new InMemoryLogger();
    const config = new WebDavConfigBuilder().networkLocation('dav.test').basePath('/dav').build();
    client = new WebDavClient(config, { transport, logger });
  });

  describe('construction', () => {
    it('should log initialization with the network location', () => {
      expect(logger.getLogsByLevel('info')).toEqual([
        {
          message: 'WebDAV client initialized',
          context: {
            networkLocation: 'dav.test',
            basePath: '/dav',
            port: undefined,
            scheme: 'https',
          },
        },
      ]);
    });

    it('should freeze its configuration', () => {
      expect(Object.isFrozen(client.getConfig())).toBe(true);
    });

    it('should build through the client builder', () => {
      const built = createClient()
        .networkLocation('dav.test')
        .port(8443)
        .transport(transport)
        .logger(logger)
        .build();

      expect(built.url('/x')).toBe('https://dav.test:8443/x');
    });
  });

  describe('url', () => {
    it('should resolve below the base path without a request', () => {
      expect(client.url('/docs/a b.txt')).toBe('https://dav.test/dav/docs/a%20b.txt');
      expect(client.url('docs/a b.txt')).toBe('https://dav.test/dav/docs/a%20b.txt');
      expect(transport.getRequests()).toEqual([]);
    });
  });

  describe('mkdir', () => {
    it.each([201, 301, 405])('should accept status %i', async (status) => {
      transport.on('MKCOL', '/dav/new', { status });

      await expect(client.mkdir('/new')).resolves.toBeUndefined();
      expect(transport.getRequests()[0]).toMatchObject({
        method: 'MKCOL',
        url: 'https://dav.test/dav/new',
      });
    });

    it('should throw ProtocolError on other status codes', async () => {
      transport.on('MKCOL', '/dav/new', { status: 500 });

      const error = await client.mkdir('/new').catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ProtocolError);
      expect(error).toMatchObject({
        method: 'MKCOL',
        statusCode: 500,
        reason: 'Internal Server Error',
        message: 'Method MKCOL returns status code: 500 and reason: Internal Server Error',
      });
    });

    it('should let transport errors through unchanged', async () => {
      const failure = new Error('connection refused');
      transport.on('MKCOL', '/dav/new', () => {
        throw failure;
      });

      await expect(client.mkdir('/new')).rejects.toBe(failure);
    });
  });

  describe('delete', () => {
    it('should resolve on 204', async () => {
      transport.on('DELETE', '/dav/old', { status: 204 });

      await expect(client.delete('/old')).resolves.toBeUndefined();
      expect(transport.getRequests()).toHaveLength(1);
    });

    it.each([404, 500])('should resolve on status %i and log it', async (status) => {
      transport.on('DELETE', '/dav/old', { status, statusText: 'Nope' });

      await expect(client.delete('/old')).resolves.toBeUndefined();
      expect(
        logger
          .getLogsByLevel('debug')
          .filter((entry) => entry.message === 'Delete not confirmed by server')
      ).toEqual([
        {
          message: 'Delete not confirmed by server',
          context: { networkLocation: 'dav.test', path: '/old', statusCode: status, reason: 'Nope' },
        },
      ]);
    });

    it('should let transport errors through', async () => {
      transport.on('DELETE', '/dav/old', () => {
        throw new Error('socket hang up');
      });

      await expect(client.delete('/old')).rejects.toThrow('socket hang up');
    });
  });

  describe('upload', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'webdav-client-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should stream a local file and return the remote path', async () => {
      const localPath = join(dir, 'f.txt');
      await writeFile(localPath, 'hello world');
      transport.on('PUT', '/dav/remote/f.txt', { status: 201 });

      const result = await client.uploadFile(localPath, '/remote/f.txt');

      expect(result).toBe('/remote/f.txt');
      const [request] = transport.getRequests();
      expect(request.method).toBe('PUT');
      expect(request.body?.toString()).toBe('hello world');
    });

    it.each([200, 204])('should accept status %i', async (status) => {
      const localPath = join(dir, 'f.txt');
      await writeFile(localPath, 'x');
      transport.on('PUT', '/dav/f.txt', { status });

      await expect(client.upload({ kind: 'file', path: localPath }, 'f.txt')).resolves.toBe(
        'f.txt'
      );
    });

    it('should throw ProtocolError on a refused upload', async () => {
      const localPath = join(dir, 'f.txt');
      await writeFile(localPath, 'x');
      transport.on('PUT', '/dav/f.txt', { status: 403 });

      await expect(client.uploadFile(localPath, '/f.txt')).rejects.toMatchObject({
        statusCode: 403,
        reason: 'Forbidden',
      });
    });

    it('should fail on a missing local file without sending a request', async () => {
      await expect(client.uploadFile(join(dir, 'missing.txt'), '/f.txt')).rejects.toMatchObject({
        code: 'ENOENT',
      });
      expect(transport.getRequests()).toEqual([]);
    });

    it('should upload a caller-owned stream', async () => {
      transport.onDefault({ status: 201 });

      await client.uploadStream(Readable.from([Buffer.from('streamed')]), '/s.bin');
      await client.upload({ kind: 'stream', stream: Readable.from([Buffer.from('again')]) }, '/t.bin');

      expect(
        transport.getRequests().map((request) => [request.path, request.body?.toString()])
      ).toEqual([
        ['/dav/s.bin', 'streamed'],
        ['/dav/t.bin', 'again'],
      ]);
    });
  });

  describe('download', () => {
    it('should buffer the body into a ContentFile', async () => {
      transport.on('GET', '/dav/docs/a.txt', { status: 200, body: 'hello' });

      const file = await client.download('/docs/a.txt');

      expect(file.name).toBe('a.txt');
      expect(file.size).toBe(5);
      expect(file.text()).toBe('hello');
    });

    it('should stream the body', async () => {
      transport.on('GET', '/dav/docs/a.txt', { status: 200, body: 'streamed' });

      const stream = await client.downloadStream('/docs/a.txt');

      expect(await text(stream)).toBe('streamed');
    });

    it('should throw ProtocolError on 404', async () => {
      transport.on('GET', '/dav/missing', { status: 404 });

      await expect(client.download('/missing')).rejects.toMatchObject({
        method: 'GET',
        statusCode: 404,
        reason: 'Not Found',
      });
    });
  });

  describe('exists', () => {
    it.each([200, 301])('should answer true on %i', async (status) => {
      transport.on('HEAD', '/dav/a', { status });

      expect(await client.exists('/a')).toBe(true);
    });

    it('should answer false on 404', async () => {
      transport.on('HEAD', '/dav/a', { status: 404 });

      expect(await client.exists('/a')).toBe(false);
    });

    it('should throw on other status codes', async () => {
      transport.on('HEAD', '/dav/a', { status: 500 });

      await expect(client.exists('/a')).rejects.toBeInstanceOf(ProtocolError);
    });
  });

  describe('size', () => {
    it('should read content-length', async () => {
      transport.on('HEAD', '/dav/a', { status: 200, headers: { 'Content-Length': '42' } });

      expect(await client.size('/a')).toBe(42);
    });

    it('should answer 0 without content-length', async () => {
      transport.on('HEAD', '/dav/a', { status: 200 });

      expect(await client.size('/a')).toBe(0);
    });

    it('should throw ProtocolError on 404', async () => {
      transport.on('HEAD', '/dav/a', { status: 404 });

      await expect(client.size('/a')).rejects.toMatchObject({ statusCode: 404 });
    });

    it('should reject a malformed content-length', async () => {
      transport.on('HEAD', '/dav/a', { status: 200, headers: { 'content-length': 'many' } });

      await expect(client.size('/a')).rejects.toMatchObject({
        code: 'Header.InvalidContentLength',
      });
    });
  });

  describe('modifiedTime', () => {
    it('should parse last-modified as UTC', async () => {
      transport.on('HEAD', '/dav/a', {
        status: 200,
        headers: { 'Last-Modified': 'Tue, 15 Nov 1994 08:12:31 GMT' },
      });

      const modified = await client.modifiedTime('/a');

      expect(modified?.toISOString()).toBe('1994-11-15T08:12:31.000Z');
    });

    it('should answer undefined for a missing resource', async () => {
      transport.on('HEAD', '/dav/a', { status: 404 });

      expect(await client.modifiedTime('/a')).toBeUndefined();
    });

    it('should throw ProtocolError on other status codes', async () => {
      transport.on('HEAD', '/dav/a', { status: 403 });

      await expect(client.modifiedTime('/a')).rejects.toBeInstanceOf(ProtocolError);
    });
  });

  describe('request logging', () => {
    it('should log each completed request', async () => {
      transport.on('HEAD', '/dav/a', { status: 200 });

      await client.exists('/a');

      expect(logger.getLogsByLevel('debug')).toEqual([
        {
          message: 'WebDAV request completed',
          context: {
            networkLocation: 'dav.test',
            method: 'HEAD',
            url: 'https://dav.test/dav/a',
            status: 200,
          },
        },
      ]);
    });
  });

  describe('close', () => {
    it('should close the transport', async () => {
      await client.close();

      expect(transport.isClosed()).toBe(true);
      await expect(client.exists('/a')).rejects.toThrow('Mock transport is closed');
    });
  });
});
