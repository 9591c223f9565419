import { stringify } from 'yaml';
import { DEFAULT_IMAGE_OCI } from '../../infra/config/env.config';
import type { ProvisionRequest } from '../../infra/contracts/provision.dto';
import {
  CopyFileEntry,
  MANIFEST_API_VERSION,
  MANIFEST_KIND,
  NodeConfig,
  VmManifest,
} from './manifest.types';

export const DEFAULT_CPUS = 2;
export const DEFAULT_DISK_SIZE = '3GB';
export const DEFAULT_MEMORY = '1GB';

export interface ProvisionDocuments {
  config: NodeConfig;
  manifest: VmManifest;
}

export function buildNodeConfig(request: ProvisionRequest): NodeConfig {
  return {
    name: request.nodeName,
    uid: request.nodeUid,
    nodeType: request.nodeType,
    token: request.token,
    masterIP: request.masterIP,
  };
}

/**
 * Builds the VM manifest with defaults for unset sizing fields.
 * copyFiles is left empty; see {@link withCopyFiles}.
 */
export function buildVmManifest(
  request: ProvisionRequest,
  defaultImageOci: string = DEFAULT_IMAGE_OCI,
): VmManifest {
  return {
    apiVersion: MANIFEST_API_VERSION,
    kind: MANIFEST_KIND,
    metadata: {
      name: request.nodeName,
      uid: request.nodeUid,
    },
    spec: {
      image: { oci: request.imageOci || defaultImageOci },
      cpus: request.cpus > 0 ? request.cpus : DEFAULT_CPUS,
      diskSize: request.diskSize || DEFAULT_DISK_SIZE,
      memory: request.memory || DEFAULT_MEMORY,
      copyFiles: [],
      ssh: request.enableSsh,
    },
  };
}

export function buildProvisionDocuments(
  request: ProvisionRequest,
  defaultImageOci?: string,
): ProvisionDocuments {
  return {
    config: buildNodeConfig(request),
    manifest: buildVmManifest(request, defaultImageOci),
  };
}

/** Returns a copy of the manifest with copyFiles replaced. */
export function withCopyFiles(manifest: VmManifest, copyFiles: CopyFileEntry[]): VmManifest {
  return {
    ...manifest,
    spec: { ...manifest.spec, copyFiles: copyFiles.map((entry) => ({ ...entry })) },
  };
}

export function serializeNodeConfig(config: NodeConfig): string {
  return JSON.stringify(config, null, 2);
}

export function serializeVmManifest(manifest: VmManifest): string {
  return stringify(manifest);
}
