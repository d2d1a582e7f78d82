import { Module } from '@nestjs/common';
import { SimConfigModule } from '@config/config.module';
import { VALIDATED_ENV } from '@config/env-config.provider';
import { SimEnv } from '@config/sim-env.schema';
import { DiceSourceFactory } from '@rng/application/ports/DiceSource';
import { CryptoDiceSourceFactory } from '@rng/infrastructure/CryptoDiceSource';
import { SeededDiceSourceFactory } from '@rng/infrastructure/SeededDiceSource';

export const DICE_SOURCE_FACTORY = 'DiceSourceFactory';

@Module({
  imports: [SimConfigModule],
  providers: [
    {
      provide: DICE_SOURCE_FACTORY,
      useFactory: (env: SimEnv): DiceSourceFactory =>
        env.SIM_SEED === undefined
          ? new CryptoDiceSourceFactory()
          : new SeededDiceSourceFactory(env.SIM_SEED),
      inject: [VALIDATED_ENV],
    },
  ],
  exports: [DICE_SOURCE_FACTORY],
})
export class RngModule {}
