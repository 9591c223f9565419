/**
 * Port for the external VM tool.
 * Each call is one blocking invocation with no retry or timeout.
 */
export interface VmProvisioner {
  /** Creates and starts a VM from a manifest file. */
  create(manifestPath: string): Promise<void>;
  /** Raw listing of running VMs. */
  listRunning(): Promise<string>;
  /**
   * Extracts the IP of a node from {@link listRunning} output.
   * @throws IpNotFoundError when no line for the node carries an IP.
   */
  findNodeIp(nodeName: string, listing: string): string;
  stop(name: string): Promise<void>;
  remove(name: string): Promise<void>;
}

export const VM_PROVISIONER = 'VmProvisioner' as const;
