/** Ignite API version written into every manifest. */
export const MANIFEST_API_VERSION = 'ignite.weave.works/v1alpha4';

export const MANIFEST_KIND = 'VM';

/** Where the node config lands inside the guest. */
export const GUEST_CONFIG_PATH = '/root/config.json';

/**
 * Document copied into the new VM so the guest can configure itself.
 * Key order is the serialized order.
 */
export interface NodeConfig {
  name: string;
  uid: string;
  nodeType: string;
  token: string;
  masterIP: string;
}

/** A host file Ignite copies into the guest on boot. */
export interface CopyFileEntry {
  hostPath: string;
  vmPath: string;
}

/** `ignite run --config` manifest. Key order is the serialized order. */
export interface VmManifest {
  apiVersion: typeof MANIFEST_API_VERSION;
  kind: typeof MANIFEST_KIND;
  metadata: {
    name: string;
    uid: string;
  };
  spec: {
    image: { oci: string };
    cpus: number;
    diskSize: string;
    memory: string;
    copyFiles: CopyFileEntry[];
    ssh: boolean;
  };
}
