import { Module } from '@nestjs/common';
import { SimConfigModule } from '@config/config.module';
import { VALIDATED_ENV } from '@config/env-config.provider';
import { SimEnv } from '@config/sim-env.schema';
import { Logger } from '@shared/ports/Logger';
import { PinoLogger, createPinoInstance } from './PinoLogger';

export const LOGGER = 'Logger';

@Module({
  imports: [SimConfigModule],
  providers: [
    {
      provide: LOGGER,
      useFactory: (env: SimEnv): Logger => {
        const pretty = Boolean(process.stderr.isTTY) && env.LOG_LEVEL !== 'silent';
        return new PinoLogger(createPinoInstance(env.LOG_LEVEL, pretty));
      },
      inject: [VALIDATED_ENV],
    },
  ],
  exports: [LOGGER],
})
export class LoggingModule {}
