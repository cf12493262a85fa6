import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { S3Client } from '@aws-sdk/client-s3';
import { S3ObjectStorage } from '../s3-backend';
import { LocalObjectStorage } from '../local-backend';
import { createObjectStorage } from '../factory';

const { send, getSignedUrl } = vi.hoisted(() => ({
  send: vi.fn(),
  getSignedUrl: vi.fn(),
}));

vi.mock('@aws-sdk/client-s3', () => ({
  S3Client: vi.fn(function () {
    return { send };
  }),
  PutObjectCommand: vi.fn(function (input: unknown) {
    return { command: 'PutObject', input };
  }),
  GetObjectCommand: vi.fn(function (input: unknown) {
    return { command: 'GetObject', input };
  }),
  HeadBucketCommand: vi.fn(function (input: unknown) {
    return { command: 'HeadBucket', input };
  }),
}));

vi.mock('@aws-sdk/s3-request-presigner', () => ({ getSignedUrl }));

describe('S3ObjectStorage', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    send.mockResolvedValue({});
    getSignedUrl.mockResolvedValue('https://artifacts.s3.test/sandbox/s1/report.pdf?X-Amz-Signature=test');
  });

  it('uploads under the prefix and returns a presigned URL', async () => {
    const storage = new S3ObjectStorage({
      bucket: 'artifacts',
      region: 'us-east-1',
      prefix: 'sandbox',
      signedUrlTtlSeconds: 600,
    });
    const data = Buffer.from('%PDF');

    const before = Date.now();
    const signed = await storage.put(data, 's1/report.pdf', 'application/pdf');
    const after = Date.now();

    expect(send).toHaveBeenCalledWith({
      command: 'PutObject',
      input: { Bucket: 'artifacts', Key: 'sandbox/s1/report.pdf', Body: data, ContentType: 'application/pdf' },
    });
    expect(getSignedUrl).toHaveBeenCalledWith(
      expect.anything(),
      { command: 'GetObject', input: { Bucket: 'artifacts', Key: 'sandbox/s1/report.pdf' } },
      { expiresIn: 600 }
    );
    expect(signed.url).toBe('https://artifacts.s3.test/sandbox/s1/report.pdf?X-Amz-Signature=test');
    expect(signed.expiresAt.getTime()).toBeGreaterThanOrEqual(before + 600_000);
    expect(signed.expiresAt.getTime()).toBeLessThanOrEqual(after + 600_000);
  });

  it('does not sign a URL when the upload fails', async () => {
    send.mockRejectedValueOnce(new Error('AccessDenied'));
    const storage = new S3ObjectStorage({ bucket: 'artifacts', region: 'us-east-1' });

    await expect(storage.put(Buffer.from('x'), 's1/a.csv', 'text/csv')).rejects.toThrow('AccessDenied');
    expect(getSignedUrl).not.toHaveBeenCalled();
  });

  it('uses path-style addressing for custom endpoints', () => {
    new S3ObjectStorage({ bucket: 'artifacts', region: 'us-east-1', endpoint: 'http://minio.test:9000' });

    expect(S3Client).toHaveBeenCalledWith({
      region: 'us-east-1',
      endpoint: 'http://minio.test:9000',
      forcePathStyle: true,
    });
  });

  it('reports an unreachable bucket as unhealthy', async () => {
    send.mockRejectedValueOnce(new Error('NotFound'));
    const storage = new S3ObjectStorage({ bucket: 'artifacts', region: 'us-east-1' });

    expect(await storage.healthCheck()).toEqual({ healthy: false, message: 'S3 error: NotFound' });
    expect(await storage.healthCheck()).toEqual({ healthy: true });
  });
});

describe('LocalObjectStorage', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'storage-test-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes the object and returns a file URL', async () => {
    const storage = new LocalObjectStorage({ directory: dir, signedUrlTtlSeconds: 60 });

    const signed = await storage.put(Buffer.from('a,b\n'), 's1/abc/data.csv', 'text/csv');

    const target = path.join(dir, 's1', 'abc', 'data.csv');
    expect(signed.url).toBe(pathToFileURL(target).href);
    expect(await fs.readFile(target, 'utf8')).toBe('a,b\n');
    expect(await fs.readdir(path.join(dir, 's1', 'abc'))).toEqual(['data.csv']);
    expect(signed.expiresAt.getTime()).toBeGreaterThan(Date.now() + 55_000);
  });

  it('refuses keys outside the storage directory', async () => {
    const storage = new LocalObjectStorage({ directory: dir });

    await expect(storage.put(Buffer.from('x'), '../escape.txt', 'text/plain')).rejects.toThrow(
      'Invalid storage key: ../escape.txt'
    );
  });

  it('is healthy when the directory is writable', async () => {
    const storage = new LocalObjectStorage({ directory: path.join(dir, 'nested') });
    expect(await storage.healthCheck()).toEqual({ healthy: true });
  });
});

describe('createObjectStorage', () => {
  it('creates the backend for the configured kind', () => {
    expect(createObjectStorage({ kind: 'local', directory: os.tmpdir() })).toBeInstanceOf(LocalObjectStorage);
    expect(createObjectStorage({ kind: 's3', bucket: 'artifacts', region: 'eu-west-1' })).toBeInstanceOf(
      S3ObjectStorage
    );
  });
});
