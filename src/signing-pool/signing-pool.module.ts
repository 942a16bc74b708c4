import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';
import { LoggingModule } from '../shared/logging/logging.module';
import { SIGNING_POOL_PORT } from '../application/ports/tokens';
import { SigningPoolService } from './signing-pool.service';

@Module({
  imports: [ConfigModule, LoggingModule],
  providers: [
    SigningPoolService,
    {
      provide: SIGNING_POOL_PORT,
      useExisting: SigningPoolService,
    },
  ],
  exports: [SigningPoolService, SIGNING_POOL_PORT],
})
export class SigningPoolModule {}
