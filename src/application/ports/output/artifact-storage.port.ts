import type { Readable } from 'stream';

export interface ArtifactStream {
  stream: Readable;
  contentLength?: number;
}

/**
 * Artifact Storage Port (Driven Port)
 * Where signed artifacts are written, kept and served from.
 */
export interface ArtifactStoragePort {
  /**
   * Local path the signer should write `outputName` to.
   */
  prepareOutputPath(outputName: string): Promise<string>;

  /**
   * Make the artifact written at `localPath` retrievable as `outputName`.
   */
  publish(outputName: string, localPath: string): Promise<void>;

  /**
   * Remove whatever a failed invocation left at `localPath`.
   */
  discard(localPath: string): Promise<void>;

  /**
   * Open the artifact for reading; resolves null when it no longer exists.
   */
  openReadStream(outputName: string): Promise<ArtifactStream | null>;
}
