/**
 * Port for transient files handed to the Ignite CLI.
 * Every staged path must be removed by the caller on every exit path.
 */
export interface ArtifactStaging {
  /**
   * Writes content to a new file named after the pattern, `*` replaced by a random token.
   * @throws StagingError when the file cannot be created, written or closed.
   */
  stage(content: string, namePattern: string): Promise<string>;
  /** Deletes a staged file. Already-missing files are not an error. */
  remove(path: string): Promise<void>;
}

export const ARTIFACT_STAGING = 'ArtifactStaging' as const;
