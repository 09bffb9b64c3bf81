import { Module } from '@nestjs/common';
import { MembershipModule } from '../membership/membership.module';
import { PaymentGatewayModule } from '../providers/payment-gateway.module';
import { LifecycleService } from './lifecycle.service';
import { PlansService } from './plans.service';
import { SubscriptionsController } from './subscriptions.controller';

@Module({
  imports: [PaymentGatewayModule, MembershipModule],
  controllers: [SubscriptionsController],
  providers: [LifecycleService, PlansService],
  exports: [LifecycleService, PlansService],
})
export class SubscriptionsModule {}
