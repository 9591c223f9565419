import { Module } from '@nestjs/common';
import { ARTIFACT_STAGING } from './artifact-staging.port';
import { FsArtifactStagingService } from './fs-artifact-staging.service';

@Module({
  providers: [{ provide: ARTIFACT_STAGING, useClass: FsArtifactStagingService }],
  exports: [ARTIFACT_STAGING],
})
export class StagingModule {}
