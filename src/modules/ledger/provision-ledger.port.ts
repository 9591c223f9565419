/** One ledger row per successful provision. Column order is the CSV column order. */
export interface ProvisionRecord {
  nodeName: string;
  nodeUid: string;
  masterIP: string;
  nodeType: string;
  token: string;
}

export const LEDGER_HEADER = ['NodeName', 'NodeUID', 'MasterIP', 'NodeType', 'Token'] as const;

/** Column positions used by the worker-join check. */
export const MASTER_IP_COLUMN = 2;
export const TOKEN_COLUMN = 4;

/**
 * Port for the append-only ledger of provisioned nodes.
 * Rows are never updated or deleted, including when a VM is deleted.
 */
export interface ProvisionLedger {
  /** @throws StoreError on any I/O failure. */
  append(record: ProvisionRecord): Promise<void>;
  /**
   * True iff some row has this master IP and token. A missing ledger is not an error.
   * Reads the whole ledger on every call.
   */
  findByMasterIPAndToken(masterIP: string, token: string): Promise<boolean>;
}

export const PROVISION_LEDGER = 'ProvisionLedger' as const;
