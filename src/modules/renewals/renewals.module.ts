import { Module } from '@nestjs/common';
import { PaymentGatewayModule } from '../providers/payment-gateway.module';
import { SubscriptionsModule } from '../subscriptions/subscriptions.module';
import { RenewalSweeperService } from './renewal-sweeper.service';

@Module({
  imports: [PaymentGatewayModule, SubscriptionsModule],
  providers: [RenewalSweeperService],
  exports: [RenewalSweeperService],
})
export class RenewalsModule {}
