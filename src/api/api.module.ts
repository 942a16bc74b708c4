import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { MulterModule } from '@nestjs/platform-express';
import * as path from 'path';
import type { AppConfig } from '../config/configuration';
import { ApplicationModule } from '../application/application.module';
import { SharedModule } from '../shared/shared.module';
import { CorrelationIdMiddleware } from '../shared/logging/correlation-id.middleware';
import { SigningJobsController } from './controllers/signing-jobs.controller';
import { SigningServiceExceptionFilter } from './filters/signing-service-exception.filter';

export const UPLOADS_SUBDIR = 'uploads';

/**
 * API Module
 * HTTP driving adapter: uploads, status and downloads.
 *
 * Multer writes uploads to disk under the staging area so that staging a
 * job is a rename rather than a copy.
 */
@Module({
  imports: [
    ApplicationModule,
    SharedModule,
    MulterModule.registerAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>) => {
        const files = configService.get('files', { infer: true });
        return {
          dest: path.join(files.stagingDir, UPLOADS_SUBDIR),
          limits: {
            fileSize: files.maxUploadSizeMb * 1024 * 1024,
            files: 1,
          },
        };
      },
    }),
  ],
  controllers: [SigningJobsController],
  providers: [
    {
      provide: APP_FILTER,
      useClass: SigningServiceExceptionFilter,
    },
  ],
})
export class ApiModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(CorrelationIdMiddleware).forRoutes('*');
  }
}
