import 'reflect-metadata';
import 'dotenv/config';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { AllConfigType } from './config/config.type';

async function bootstrap() {
  // No HTTP listener: the lifecycle is driven by callers of PermissionsService
  const app = await NestFactory.createApplicationContext(AppModule);
  const configService = app.get(ConfigService<AllConfigType>);

  app.enableShutdownHooks();

  new Logger('Bootstrap').log(
    `${configService.getOrThrow('app.name', { infer: true })} started (${configService.getOrThrow('app.nodeEnv', { infer: true })})`,
  );
}
void bootstrap();
