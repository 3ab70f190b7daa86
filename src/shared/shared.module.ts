import { Global, Module } from '@nestjs/common';
import { CLOCK, SystemClock } from './clock';

/**
 * Shared module providing the process clock.
 *
 * Global so every feature module can inject {@link CLOCK}.
 */
@Global()
@Module({
  providers: [{ provide: CLOCK, useClass: SystemClock }],
  exports: [CLOCK],
})
export class SharedModule {}
