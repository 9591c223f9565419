import { Module } from '@nestjs/common';
import { CsvProvisionLedgerService } from './csv-provision-ledger.service';
import { PROVISION_LEDGER } from './provision-ledger.port';

@Module({
  providers: [{ provide: PROVISION_LEDGER, useClass: CsvProvisionLedgerService }],
  exports: [PROVISION_LEDGER],
})
export class LedgerModule {}
