/**
 * Tests for recursive directory upload
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdir, mkdtemp, rm, symlink, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ProtocolError } from '../../errors.js';
import { WebDavConfigBuilder } from '../../config/index.js';
import { InMemoryLogger } from '../../observability/index.js';
import { MockTransport } from '../../simulation/index.js';
import { WebDavClient } from '../index.js';

describe('WebDavClient.uploadDir', () => {
  let root: string;
  let transport: MockTransport;
  let logger: InMemoryLogger;

  function createTestClient(createParents = false): WebDavClient {
    const config = new WebDavConfigBuilder()
      .networkLocation('dav.test')
      .basePath('/dav')
      .createParents(createParents)
      .build();
    return new WebDavClient(config, { transport, logger });
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'webdav-upload-'));
    await writeFile(join(root, 'a.txt'), 'alpha');
    await mkdir(join(root, 'sub'));
    await writeFile(join(root, 'sub', 'b.txt'), 'beta');
    transport = new MockTransport();
    logger = new InMemoryLogger();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should upload every file under the remote root', async () => {
    transport.onDefault({ status: 201 });

    const uploaded = await createTestClient().uploadDir('/dest', root);

    expect(uploaded).toEqual(['/dest/a.txt', '/dest/sub/b.txt']);
    expect(
      transport.getRequests().map((request) => [request.method, request.path, request.body?.toString()])
    ).toEqual([
      ['PUT', '/dav/dest/a.txt', 'alpha'],
      ['PUT', '/dav/dest/sub/b.txt', 'beta'],
    ]);
    expect(logger.getLogsByLevel('info')[1]).toEqual({
      message: 'Directory uploaded',
      context: { networkLocation: 'dav.test', localRoot: root, remoteRoot: '/dest', files: 2 },
    });
  });

  it('should upload the files of a directory before its subdirectories', async () => {
    await writeFile(join(root, 'z.txt'), 'zulu');
    transport.onDefault({ status: 201 });

    const uploaded = await createTestClient().uploadDir('/dest', root);

    expect(uploaded).toEqual(['/dest/a.txt', '/dest/z.txt', '/dest/sub/b.txt']);
  });

  it('should stop at the first failed upload', async () => {
    transport.on('PUT', '/dav/dest/a.txt', { status: 500 }).onDefault({ status: 201 });

    await expect(createTestClient().uploadDir('/dest', root)).rejects.toBeInstanceOf(
      ProtocolError
    );
    expect(transport.getRequests()).toHaveLength(1);
  });

  it('should create each parent collection once when configured', async () => {
    await writeFile(join(root, 'sub', 'c.txt'), 'gamma');
    transport.onDefault({ status: 201 });

    await createTestClient(true).uploadDir('/dest', root);

    expect(transport.getRequests().map((request) => `${request.method} ${request.path}`)).toEqual([
      'MKCOL /dav/dest',
      'PUT /dav/dest/a.txt',
      'MKCOL /dav/dest/sub',
      'PUT /dav/dest/sub/b.txt',
      'PUT /dav/dest/sub/c.txt',
    ]);
  });

  it('should upload nothing from an empty directory', async () => {
    const empty = join(root, 'empty');
    await mkdir(empty);

    expect(await createTestClient(true).uploadDir('/dest', empty)).toEqual([]);
    expect(transport.getRequests()).toEqual([]);
  });

  it('should fail on a dangling link after uploading the files before it', async () => {
    await symlink(join(root, 'missing.txt'), join(root, 'b-link.txt'));
    transport.onDefault({ status: 201 });

    await expect(createTestClient().uploadDir('/dest', root)).rejects.toMatchObject({
      code: 'ENOENT',
    });
    expect(transport.getRequests().map((request) => request.path)).toEqual(['/dav/dest/a.txt']);
  });
});
