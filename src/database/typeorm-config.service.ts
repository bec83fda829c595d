import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions, TypeOrmOptionsFactory } from '@nestjs/typeorm';
import { join } from 'path';
import { AllConfigType } from '../config/config.type';

@Injectable()
export class TypeOrmConfigService implements TypeOrmOptionsFactory {
  constructor(private configService: ConfigService<AllConfigType>) {}

  createTypeOrmOptions(): TypeOrmModuleOptions {
    const sslEnabled = this.configService.get('database.sslEnabled', {
      infer: true,
    });

    return {
      type: this.configService.getOrThrow<AllConfigType, 'database.type'>(
        'database.type',
        { infer: true },
      ),
      url: this.configService.get('database.url', { infer: true }),
      host: this.configService.get('database.host', { infer: true }),
      port: this.configService.get('database.port', { infer: true }),
      username: this.configService.get('database.username', { infer: true }),
      password: this.configService.get('database.password', { infer: true }),
      database: this.configService.get<AllConfigType, 'database.name'>(
        'database.name',
        { infer: true },
      ),
      synchronize: this.configService.get('database.synchronize', {
        infer: true,
      }),
      migrationsRun: this.configService.get('database.migrationsRun', {
        infer: true,
      }),
      logging: this.configService.get('database.logging', { infer: true }),
      autoLoadEntities: true,
      migrations: [join(__dirname, 'migrations', '*{.ts,.js}')],
      extra: {
        max: this.configService.get('database.maxConnections', { infer: true }),
        ssl: sslEnabled
          ? {
              rejectUnauthorized: this.configService.get(
                'database.rejectUnauthorized',
                { infer: true },
              ),
            }
          : undefined,
      },
    };
  }
}
