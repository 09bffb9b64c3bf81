import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { PaymentGatewayModule } from '../providers/payment-gateway.module';
import { HealthController } from './health.controller';
import { HealthService } from './health.service';

@Module({
  imports: [TerminusModule, PaymentGatewayModule],
  controllers: [HealthController],
  providers: [HealthService],
})
export class HealthModule {}
