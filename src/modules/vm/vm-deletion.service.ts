import { Inject, Injectable, LoggerService } from '@nestjs/common';
import { FailureStatusCode } from '../../infra/contracts/http-status';
import type { DeleteVmResult } from '../../infra/contracts/provision.dto';
import { ProvisionApiError, ValidationError } from '../../infra/contracts/provision-errors';
import { APP_LOGGER } from '../../infra/logging/logging.module';
import { VM_PROVISIONER } from './vm-provisioner.port';
import type { VmProvisioner } from './vm-provisioner.port';

export type DeleteVmOutcome =
  | { ok: true; result: DeleteVmResult }
  | { ok: false; status: FailureStatusCode; result: DeleteVmResult };

/**
 * Stops then removes a VM. Ledger rows for the VM are left in place.
 */
@Injectable()
export class VmDeletionService {
  constructor(
    @Inject(VM_PROVISIONER) private readonly provisioner: VmProvisioner,
    @Inject(APP_LOGGER) private readonly logger: LoggerService,
  ) {}

  async delete(vmName: string | undefined): Promise<DeleteVmOutcome> {
    if (!vmName) {
      return this.fail(new ValidationError('VM name is required'));
    }

    try {
      await this.provisioner.stop(vmName);
    } catch (err) {
      return this.fail(err, 'Failed to stop VM: ');
    }

    try {
      await this.provisioner.remove(vmName);
    } catch (err) {
      return this.fail(err, 'Failed to remove VM: ');
    }

    this.logger.log(`VM '${vmName}' successfully deleted`);
    return {
      ok: true,
      result: { success: true, message: `VM '${vmName}' successfully deleted` },
    };
  }

  private fail(err: unknown, prefix = ''): DeleteVmOutcome {
    if (!(err instanceof ProvisionApiError)) throw err;
    const error = `${prefix}${err.message}`;
    this.logger.error(error);
    return { ok: false, status: err.status, result: { success: false, error } };
  }
}
