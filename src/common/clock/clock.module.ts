import { Global, Module } from '@nestjs/common';
import { Clock, IdGenerator, RandomIdGenerator, SystemClock } from './clock';

@Global()
@Module({
  providers: [
    { provide: Clock, useClass: SystemClock },
    { provide: IdGenerator, useClass: RandomIdGenerator },
  ],
  exports: [Clock, IdGenerator],
})
export class ClockModule {}
