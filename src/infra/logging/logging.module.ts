import { Global, Logger, Module } from '@nestjs/common';

/** NestJS injection token for the application logger (a LoggerService). */
export const APP_LOGGER = 'AppLogger' as const;

/**
 * Provides one Logger for workflows, adapters and middleware.
 * Logger delegates to whatever logger the Nest app was created with.
 */
@Global()
@Module({
  providers: [{ provide: APP_LOGGER, useValue: new Logger('IgniteProvisionApi') }],
  exports: [APP_LOGGER],
})
export class LoggingModule {}
