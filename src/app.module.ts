import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { AppController } from './app.controller';
import { ConfigModule } from './infra/config/config.module';
import { RequestIdMiddleware } from './infra/http/request-id.middleware';
import { RequestLoggingMiddleware } from './infra/http/request-logging.middleware';
import { LoggingModule } from './infra/logging/logging.module';
import { ProvisioningModule } from './modules/provisioning/provisioning.module';
import { VmModule } from './modules/vm/vm.module';

/** Root application module. ConfigModule loads .env first. */
@Module({
  imports: [ConfigModule, LoggingModule, ProvisioningModule, VmModule],
  controllers: [AppController],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(RequestIdMiddleware, RequestLoggingMiddleware).forRoutes('*');
  }
}
