export interface UploadArtifactRequest {
  runId: string;
  outputFormat: string;
  audio: Buffer;
  mimeType: string;
  /** File name offered to whoever downloads the artifact. */
  downloadName: string;
  metadata: Record<string, string>;
}

export interface UploadArtifactResult {
  storageKey: string;
  sizeBytes: number;
  sha256: string;
}

export interface ArtifactStorage {
  readonly name: string;
  uploadAudio(request: UploadArtifactRequest): Promise<UploadArtifactResult>;
  getDownloadUrl(storageKey: string, downloadName: string): Promise<string>;
  cleanupExpired(retentionHours: number): Promise<number>;
}
