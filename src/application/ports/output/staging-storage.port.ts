/**
 * Staging Storage Port (Driven Port)
 * Holds uploaded bytes until the job's background unit has finished with them.
 */
export interface StagingStoragePort {
  /**
   * Move an uploaded temp file into staging as `<jobId><extension>` and
   * return the staged path.
   */
  stage(jobId: string, extension: string, sourcePath: string): Promise<string>;

  /**
   * Remove a staged or uploaded file. Missing files are not an error.
   */
  remove(filePath: string): Promise<void>;
}
