import { config, type ServiceConfig } from '../../config.js';
import { LocalArtifactStorage } from './local.js';
import { S3ArtifactStorage } from './s3.js';
import type { ArtifactStorage } from './types.js';

export function createArtifactStorage(cfg: ServiceConfig = config): ArtifactStorage {
  if (cfg.storageBackend === 's3') {
    return new S3ArtifactStorage({
      endpoint: cfg.s3Endpoint,
      region: cfg.s3Region,
      bucket: cfg.s3Bucket,
      accessKeyId: cfg.s3AccessKeyId,
      secretAccessKey: cfg.s3SecretAccessKey,
      forcePathStyle: cfg.s3ForcePathStyle,
      keyPrefix: cfg.s3KeyPrefix,
      signedUrlTtlSeconds: cfg.s3SignedUrlTtlSeconds,
    });
  }
  return new LocalArtifactStorage(cfg.artifactsDir, cfg.publicBaseUrl);
}
