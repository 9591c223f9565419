import { Module } from '@nestjs/common';
import { LedgerModule } from '../ledger/ledger.module';
import { StagingModule } from '../staging/staging.module';
import { VmModule } from '../vm/vm.module';
import { ProvisioningController } from './provisioning.controller';
import { ProvisionWorkflowService } from './provision-workflow.service';

@Module({
  imports: [LedgerModule, StagingModule, VmModule],
  controllers: [ProvisioningController],
  providers: [ProvisionWorkflowService],
})
export class ProvisioningModule {}
