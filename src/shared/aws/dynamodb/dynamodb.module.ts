import { Module } from '@nestjs/common';
import { ConfigModule } from '../../../config/config.module';
import { LoggingModule } from '../../logging/logging.module';
import { DynamoDbService } from './dynamodb.service';

@Module({
  imports: [ConfigModule, LoggingModule],
  providers: [DynamoDbService],
  exports: [DynamoDbService],
})
export class DynamoDbModule {}
