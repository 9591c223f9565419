import { Inject, Injectable } from '@nestjs/common';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { open, readFile } from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import { resolve } from 'path';
import { PROVISION_CONFIG } from '../../infra/config/env.config';
import type { ProvisionApiConfig } from '../../infra/config/env.config';
import { StoreError, describeError } from '../../infra/contracts/provision-errors';
import {
  LEDGER_HEADER,
  MASTER_IP_COLUMN,
  ProvisionLedger,
  ProvisionRecord,
  TOKEN_COLUMN,
} from './provision-ledger.port';

/**
 * CSV-file ledger. No locking: concurrent appends and reads race on the file.
 * The header check and the row write are separate steps, so a crash between them
 * can leave a non-empty ledger without a header.
 */
@Injectable()
export class CsvProvisionLedgerService implements ProvisionLedger {
  private readonly path: string;

  constructor(@Inject(PROVISION_CONFIG) config: ProvisionApiConfig) {
    this.path = resolve(config.ledgerPath);
  }

  async append(record: ProvisionRecord): Promise<void> {
    let handle: FileHandle;
    try {
      handle = await open(this.path, 'a', 0o644);
    } catch (err) {
      throw new StoreError(`failed to open CSV file: ${describeError(err)}`, { cause: err });
    }

    let writeError: unknown;
    try {
      await this.writeRecord(handle, record);
    } catch (err) {
      writeError = err;
    }

    try {
      await handle.close();
    } catch (err) {
      const closeFailure = `failed to close CSV file: ${describeError(err)}`;
      throw writeError === undefined
        ? new StoreError(closeFailure, { cause: err })
        : new StoreError(`${describeError(writeError)}; ${closeFailure}`, { cause: writeError });
    }
    if (writeError !== undefined) throw writeError;
  }

  async findByMasterIPAndToken(masterIP: string, token: string): Promise<boolean> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf8');
    } catch (err) {
      if (isNotFound(err)) return false;
      throw new StoreError(`failed to open CSV file: ${describeError(err)}`, { cause: err });
    }

    let rows: string[][];
    try {
      rows = parse(content, { relax_column_count: true, skip_empty_lines: true });
    } catch (err) {
      throw new StoreError(`failed to read CSV file: ${describeError(err)}`, { cause: err });
    }

    const records = rows.length > 0 && isHeaderRow(rows[0]) ? rows.slice(1) : rows;
    return records.some(
      (row) => row[MASTER_IP_COLUMN] === masterIP && row[TOKEN_COLUMN] === token,
    );
  }

  private async writeRecord(handle: FileHandle, record: ProvisionRecord): Promise<void> {
    let size: number;
    try {
      ({ size } = await handle.stat());
    } catch (err) {
      throw new StoreError(`failed to get file info: ${describeError(err)}`, { cause: err });
    }

    const rows: string[][] = [];
    if (size === 0) rows.push([...LEDGER_HEADER]);
    rows.push([record.nodeName, record.nodeUid, record.masterIP, record.nodeType, record.token]);

    try {
      await handle.appendFile(stringify(rows), 'utf8');
    } catch (err) {
      throw new StoreError(`failed to write to CSV file: ${describeError(err)}`, { cause: err });
    }
  }
}

/** Ledgers written before a crash between header and row can lack the header. */
function isHeaderRow(row: string[]): boolean {
  return row.length === LEDGER_HEADER.length && LEDGER_HEADER.every((name, i) => row[i] === name);
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
