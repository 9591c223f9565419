import { Inject, Injectable, LoggerService } from '@nestjs/common';
import { PROVISION_CONFIG } from '../../infra/config/env.config';
import type { ProvisionApiConfig } from '../../infra/config/env.config';
import { FailureStatusCode } from '../../infra/contracts/http-status';
import type {
  NodeType,
  ProvisionRequest,
  ProvisionResult,
} from '../../infra/contracts/provision.dto';
import { ProvisionApiError, ValidationError } from '../../infra/contracts/provision-errors';
import { APP_LOGGER } from '../../infra/logging/logging.module';
import { PROVISION_LEDGER } from '../ledger/provision-ledger.port';
import type { ProvisionLedger } from '../ledger/provision-ledger.port';
import { ARTIFACT_STAGING } from '../staging/artifact-staging.port';
import type { ArtifactStaging } from '../staging/artifact-staging.port';
import { VM_PROVISIONER } from '../vm/vm-provisioner.port';
import type { VmProvisioner } from '../vm/vm-provisioner.port';
import {
  buildProvisionDocuments,
  serializeNodeConfig,
  serializeVmManifest,
  withCopyFiles,
} from './manifest-builder';
import { GUEST_CONFIG_PATH } from './manifest.types';

export type ProvisionStage =
  | 'validating'
  | 'building'
  | 'staging'
  | 'provisioning'
  | 'discovering-ip'
  | 'recording';

export type ProvisionOutcome =
  | { ok: true; result: ProvisionResult }
  | { ok: false; stage: ProvisionStage; status: FailureStatusCode; result: ProvisionResult };

export const CONFIG_FILE_PATTERN = 'config-*.json';
export const MANIFEST_FILE_PATTERN = 'ignite-config-*.yaml';

/** Prefix a stage adds to the message of the error that ended it. */
const STAGE_ERROR_PREFIX: Partial<Record<ProvisionStage, string>> = {
  'discovering-ip': 'Failed to get master IP: ',
  recording: 'Failed to store provision info: ',
};

/**
 * Provisions a master or worker node:
 * validate → build documents → stage files → ignite run → ignite ps → ledger append.
 *
 * Staged files are removed before returning on every path. Nothing else is rolled back:
 * a VM created before IP discovery or the ledger append fails keeps running with no
 * ledger row.
 */
@Injectable()
export class ProvisionWorkflowService {
  constructor(
    @Inject(PROVISION_CONFIG) private readonly config: ProvisionApiConfig,
    @Inject(PROVISION_LEDGER) private readonly ledger: ProvisionLedger,
    @Inject(ARTIFACT_STAGING) private readonly staging: ArtifactStaging,
    @Inject(VM_PROVISIONER) private readonly provisioner: VmProvisioner,
    @Inject(APP_LOGGER) private readonly logger: LoggerService,
  ) {}

  async provision(nodeType: NodeType, request: ProvisionRequest): Promise<ProvisionOutcome> {
    this.logger.log(
      `Received ${nodeType} provision request: node=${request.nodeName} uid=${request.nodeUid}`,
    );
    let stage: ProvisionStage = 'validating';
    const staged: string[] = [];
    try {
      await this.validate(nodeType, request);

      stage = 'building';
      const { config, manifest } = buildProvisionDocuments(request, this.config.defaultImageOci);
      this.logger.log(`Using image OCI: ${manifest.spec.image.oci}`);

      stage = 'staging';
      const configPath = await this.staging.stage(serializeNodeConfig(config), CONFIG_FILE_PATTERN);
      staged.push(configPath);
      const finalManifest = withCopyFiles(manifest, [
        { hostPath: configPath, vmPath: GUEST_CONFIG_PATH },
      ]);
      const manifestPath = await this.staging.stage(
        serializeVmManifest(finalManifest),
        MANIFEST_FILE_PATTERN,
      );
      staged.push(manifestPath);

      stage = 'provisioning';
      this.logger.log(`Provisioning VM: ${request.nodeName}`);
      await this.provisioner.create(manifestPath);

      stage = 'discovering-ip';
      const listing = await this.provisioner.listRunning();
      const masterIP = this.provisioner.findNodeIp(request.nodeName, listing);

      stage = 'recording';
      await this.ledger.append({
        nodeName: request.nodeName,
        nodeUid: request.nodeUid,
        masterIP,
        nodeType: request.nodeType,
        token: request.token,
      });

      this.logger.log(`VM '${request.nodeName}' successfully provisioned with IP ${masterIP}`);
      return {
        ok: true,
        result: {
          success: true,
          message: `VM '${request.nodeName}' successfully provisioned`,
          nodeId: request.nodeUid,
          masterIP,
        },
      };
    } catch (err) {
      if (!(err instanceof ProvisionApiError)) throw err;
      const error = `${STAGE_ERROR_PREFIX[stage] ?? ''}${err.message}`;
      this.logger.error(`${nodeType} provision failed while ${stage}: ${error}`);
      return {
        ok: false,
        stage,
        status: err.status,
        result: { success: false, message: '', error },
      };
    } finally {
      await this.discardStaged(staged);
    }
  }

  private async validate(nodeType: NodeType, request: ProvisionRequest): Promise<void> {
    if (!request.nodeName || !request.nodeUid) {
      throw new ValidationError('NodeName and NodeUID are required fields');
    }
    if (nodeType !== 'worker') return;
    if (!request.masterIP || request.nodeType !== 'worker') {
      throw new ValidationError(
        "NodeName, NodeUID, MasterIP, and NodeType 'worker' are required fields",
      );
    }
    const known = await this.ledger.findByMasterIPAndToken(request.masterIP, request.token);
    if (!known) {
      throw new ValidationError('Token and MasterIP do not match any existing records');
    }
  }

  private async discardStaged(paths: string[]): Promise<void> {
    const results = await Promise.allSettled(paths.map((path) => this.staging.remove(path)));
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        this.logger.warn(`Failed to remove staged file ${paths[i]}: ${String(result.reason)}`);
      }
    });
  }
}
