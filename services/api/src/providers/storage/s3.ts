import { GetObjectCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { extensionForFormat, sha256Hex } from '../../core/artifacts.js';
import type { ArtifactStorage, UploadArtifactRequest, UploadArtifactResult } from './types.js';

function normalizePrefix(prefix: string): string {
  return prefix.replace(/^\/+|\/+$/g, '');
}

export interface S3StorageOptions {
  endpoint: string;
  region: string;
  bucket: string;
  accessKeyId: string;
  secretAccessKey: string;
  forcePathStyle: boolean;
  keyPrefix: string;
  signedUrlTtlSeconds: number;
}

function buildObjectKey(keyPrefix: string, runId: string, outputFormat: string): string {
  const ext = extensionForFormat(outputFormat);
  const dateFolder = new Date().toISOString().slice(0, 10);
  const prefix = normalizePrefix(keyPrefix);
  return prefix ? `${prefix}/${dateFolder}/${runId}.${ext}` : `${dateFolder}/${runId}.${ext}`;
}

function contentDisposition(downloadName: string): string {
  return `attachment; filename="${downloadName.replace(/"/g, '')}"`;
}

export class S3ArtifactStorage implements ArtifactStorage {
  readonly name = 's3';
  private readonly client: S3Client;

  constructor(private readonly options: S3StorageOptions) {
    this.client = new S3Client({
      endpoint: options.endpoint,
      region: options.region,
      forcePathStyle: options.forcePathStyle,
      credentials: {
        accessKeyId: options.accessKeyId,
        secretAccessKey: options.secretAccessKey,
      },
    });
  }

  async uploadAudio(request: UploadArtifactRequest): Promise<UploadArtifactResult> {
    const key = buildObjectKey(this.options.keyPrefix, request.runId, request.outputFormat);
    const sha256 = sha256Hex(request.audio);

    await this.client.send(
      new PutObjectCommand({
        Bucket: this.options.bucket,
        Key: key,
        Body: request.audio,
        ContentType: request.mimeType,
        ContentDisposition: contentDisposition(request.downloadName),
        Metadata: { ...request.metadata, sha256 },
      }),
    );

    return {
      storageKey: key,
      sizeBytes: request.audio.byteLength,
      sha256,
    };
  }

  // Signed per request, so a stored run never hands out an expired URL.
  async getDownloadUrl(storageKey: string, downloadName: string): Promise<string> {
    return getSignedUrl(
      this.client,
      new GetObjectCommand({
        Bucket: this.options.bucket,
        Key: storageKey,
        ResponseContentDisposition: contentDisposition(downloadName),
      }),
      { expiresIn: this.options.signedUrlTtlSeconds },
    );
  }

  async cleanupExpired(_retentionHours: number): Promise<number> {
    // Expiry is left to bucket lifecycle rules.
    return 0;
  }
}
