import { Module } from '@nestjs/common';
import { AwsModule } from './aws/aws.module';
import { LoggingModule } from './logging/logging.module';
import { ContentHasherService } from './integrity/content-hasher.service';
import { FormatValidatorService } from './validation/format-validator.service';

@Module({
  imports: [AwsModule, LoggingModule],
  providers: [ContentHasherService, FormatValidatorService],
  exports: [AwsModule, LoggingModule, ContentHasherService, FormatValidatorService],
})
export class SharedModule {}
