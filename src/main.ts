import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { PROVISION_CONFIG } from './infra/config/env.config';
import type { ProvisionApiConfig } from './infra/config/env.config';

/**
 * Bootstrap the NestJS application with validation and Swagger documentation.
 */
async function bootstrap(): Promise<void> {
  const app = configureApp(await NestFactory.create(AppModule));

  const config = new DocumentBuilder()
    .setTitle('Ignite Provision API')
    .setDescription(
      'Provisions and deletes Ignite VMs and keeps a ledger of provisioned nodes for worker joins.',
    )
    .setVersion('1.0')
    .addTag('provisioning', 'Master and worker provisioning')
    .addTag('vm', 'VM deletion')
    .addTag('health', 'Health check')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  const { port } = app.get<ProvisionApiConfig>(PROVISION_CONFIG);
  Logger.log(`Starting Ignite API server on port ${port}...`, 'Bootstrap');
  await app.listen(port);
}

bootstrap().catch((err: unknown) => {
  Logger.error(`Failed to start server: ${String(err)}`, undefined, 'Bootstrap');
  process.exit(1);
});
