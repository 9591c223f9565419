import { Global, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import { PROVISION_CONFIG, resolveProvisionConfig } from './env.config';

/**
 * Config module: loads .env and provides the resolved service config.
 * Tests override PROVISION_CONFIG to point the ledger and staging at temp dirs.
 */
@Global()
@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
    }),
  ],
  providers: [{ provide: PROVISION_CONFIG, useFactory: resolveProvisionConfig }],
  exports: [NestConfigModule, PROVISION_CONFIG],
})
export class ConfigModule {}
