import { Module } from '@nestjs/common';
import { LoggerModule } from 'nestjs-pino';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { validateEnv } from './config/env.schema';
import appConfig from './config/app.config';
import { ApiModule } from './modules/api/api.module';
import { KafkaModule } from './modules/kafka/kafka.module';
import { HealthModule } from './modules/health/health.module';

/**
 * App Module - Main application module
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: `.env`,
      load: [appConfig],
      validate: validateEnv,
    }),
    LoggerModule.forRootAsync({
      inject: [appConfig.KEY],
      useFactory: (app: ConfigType<typeof appConfig>) => ({
        pinoHttp: {
          level: app.logLevel,
          transport: app.nodeEnv === 'production' ? undefined : { target: 'pino-pretty', options: { singleLine: true } },
        },
      }),
    }),
    ApiModule,
    KafkaModule,
    HealthModule,
  ],
})
export class AppModule { }
