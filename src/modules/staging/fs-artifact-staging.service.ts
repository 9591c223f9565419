import { Inject, Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { open, rm } from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import { join } from 'path';
import { PROVISION_CONFIG } from '../../infra/config/env.config';
import type { ProvisionApiConfig } from '../../infra/config/env.config';
import { StagingError, describeError } from '../../infra/contracts/provision-errors';
import { ArtifactStaging } from './artifact-staging.port';

/** Stages files in the configured staging directory (OS temp dir by default). */
@Injectable()
export class FsArtifactStagingService implements ArtifactStaging {
  constructor(@Inject(PROVISION_CONFIG) private readonly config: ProvisionApiConfig) {}

  async stage(content: string, namePattern: string): Promise<string> {
    const path = join(this.config.stagingDir, stagedFileName(namePattern));
    let handle: FileHandle;
    try {
      handle = await open(path, 'wx', 0o600);
    } catch (err) {
      throw new StagingError(`error creating temp file: ${describeError(err)}`, { cause: err });
    }

    try {
      await handle.writeFile(content, 'utf8');
    } catch (err) {
      const closeFailure = await handle.close().then(
        () => '',
        (closeErr: unknown) => `; error closing temp file: ${describeError(closeErr)}`,
      );
      const removeFailure = await this.discardPartial(path);
      throw new StagingError(
        `error writing to temp file: ${describeError(err)}${closeFailure}${removeFailure}`,
        { cause: err },
      );
    }

    try {
      await handle.close();
    } catch (err) {
      const removeFailure = await this.discardPartial(path);
      throw new StagingError(`error closing temp file: ${describeError(err)}${removeFailure}`, {
        cause: err,
      });
    }
    return path;
  }

  async remove(path: string): Promise<void> {
    await rm(path, { force: true });
  }

  /** Removes a partly written file; returns the failure as a message suffix, or ''. */
  private async discardPartial(path: string): Promise<string> {
    return this.remove(path).then(
      () => '',
      (err: unknown) => `; error removing temp file: ${describeError(err)}`,
    );
  }
}

/** `config-*.json` → `config-<random>.json`; patterns without `*` get the token appended. */
export function stagedFileName(namePattern: string): string {
  const token = randomUUID().replace(/-/g, '').slice(0, 16);
  const star = namePattern.lastIndexOf('*');
  if (star === -1) return `${namePattern}${token}`;
  return `${namePattern.slice(0, star)}${token}${namePattern.slice(star + 1)}`;
}
