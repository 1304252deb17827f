import { Module } from '@nestjs/common';
import { LoggerModule } from 'nestjs-pino';
import { PrometheusModule } from '@willsoto/nestjs-prometheus';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import { BullModule } from '@nestjs/bullmq';
import { validateEnv } from './config/env.validation';
import { LeadsModule } from './leads/leads.module';
import { EnrichmentModule } from './enrichment/enrichment.module';

function databaseOptions(configService: ConfigService): TypeOrmModuleOptions {
  const common = {
    autoLoadEntities: true,
    synchronize: configService.get<string>('NODE_ENV') !== 'production',
  };

  if (configService.get<string>('DB_TYPE') === 'better-sqlite3') {
    return {
      ...common,
      type: 'better-sqlite3',
      database: configService.get<string>('DATABASE_PATH', ':memory:'),
    };
  }
  return {
    ...common,
    type: 'postgres',
    url: configService.get<string>('DATABASE_URL'),
  };
}

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnv,
    }),
    LoggerModule.forRoot({
      pinoHttp: {
        transport:
          process.env.NODE_ENV !== 'production'
            ? { target: 'pino-pretty', options: { colorize: true } }
            : undefined,
        redact: ['[*].email', 'req.body.email', 'req.body.records[*].email'],
      },
    }),
    PrometheusModule.register({
      path: '/metrics',
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: databaseOptions,
      inject: [ConfigService],
    }),
    BullModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        connection: {
          host: configService.get<string>('REDIS_HOST'),
          port: configService.get<number>('REDIS_PORT'),
        },
      }),
      inject: [ConfigService],
    }),
    LeadsModule,
    EnrichmentModule,
  ],
})
export class AppModule {}
