import { Module } from '@nestjs/common';
import { COMMAND_RUNNER, SpawnCommandRunner } from './command-runner';
import { IgniteVmProvisionerService } from './ignite-vm-provisioner.service';
import { VmController } from './vm.controller';
import { VmDeletionService } from './vm-deletion.service';
import { VM_PROVISIONER } from './vm-provisioner.port';

/** Ignite adapter and the VM deletion API. */
@Module({
  controllers: [VmController],
  providers: [
    { provide: COMMAND_RUNNER, useClass: SpawnCommandRunner },
    { provide: VM_PROVISIONER, useClass: IgniteVmProvisionerService },
    VmDeletionService,
  ],
  exports: [VM_PROVISIONER],
})
export class VmModule {}
