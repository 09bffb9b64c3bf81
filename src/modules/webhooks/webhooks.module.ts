import { Module } from '@nestjs/common';
import { PaymentGatewayModule } from '../providers/payment-gateway.module';
import { SubscriptionsModule } from '../subscriptions/subscriptions.module';
import { WebhookReconcilerService } from './webhook-reconciler.service';
import { WebhooksController } from './webhooks.controller';

@Module({
  imports: [PaymentGatewayModule, SubscriptionsModule],
  controllers: [WebhooksController],
  providers: [WebhookReconcilerService],
  exports: [WebhookReconcilerService],
})
export class WebhooksModule {}
