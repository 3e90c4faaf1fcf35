import { cleanupOldArtifacts, writeArtifact } from '../../core/artifacts.js';
import type { ArtifactStorage, UploadArtifactRequest, UploadArtifactResult } from './types.js';

export class LocalArtifactStorage implements ArtifactStorage {
  readonly name = 'local';

  constructor(
    private readonly directory: string,
    private readonly publicBaseUrl: string,
  ) {}

  async uploadAudio(request: UploadArtifactRequest): Promise<UploadArtifactResult> {
    const artifact = await writeArtifact({
      directory: this.directory,
      runId: request.runId,
      outputFormat: request.outputFormat,
      audio: request.audio,
    });

    return {
      storageKey: artifact.fileName,
      sizeBytes: artifact.sizeBytes,
      sha256: artifact.sha256,
    };
  }

  async getDownloadUrl(storageKey: string, downloadName: string): Promise<string> {
    const query = new URLSearchParams({ download: downloadName });
    return `${this.publicBaseUrl}/artifacts/${encodeURIComponent(storageKey)}?${query.toString()}`;
  }

  async cleanupExpired(retentionHours: number): Promise<number> {
    return cleanupOldArtifacts(this.directory, retentionHours);
  }
}
