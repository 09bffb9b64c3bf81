import { HttpModule } from '@nestjs/axios';
import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CircuitBreakerService } from './circuit-breaker/circuit-breaker.service';
import { ProcessingLimitsService } from './limits/processing-limits.service';
import { PayloadValidatorService } from './validation/payload-validator.service';

@Global()
@Module({
  imports: [
    ConfigModule,
    HttpModule.register({
      timeout: 15000,
      maxRedirects: 0,
    }),
  ],
  providers: [
    CircuitBreakerService,
    ProcessingLimitsService,
    PayloadValidatorService,
  ],
  exports: [
    HttpModule,
    CircuitBreakerService,
    ProcessingLimitsService,
    PayloadValidatorService,
  ],
})
export class CoreModule {}
