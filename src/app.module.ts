import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { validateEnvironment } from './config/env.validation';
import { CoreModule } from './core/core.module';
import { AdminModule } from './modules/admin/admin.module';
import { HealthModule } from './modules/health/health.module';
import { MembershipModule } from './modules/membership/membership.module';
import { PaymentGatewayModule } from './modules/providers/payment-gateway.module';
import { RenewalsModule } from './modules/renewals/renewals.module';
import { SubscriptionsModule } from './modules/subscriptions/subscriptions.module';
import { WebhooksModule } from './modules/webhooks/webhooks.module';
import { StoreModule } from './store/store.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      validate: validateEnvironment,
    }),
    CoreModule,
    ScheduleModule.forRoot(),
    StoreModule,
    PaymentGatewayModule,
    MembershipModule,
    SubscriptionsModule,
    WebhooksModule,
    RenewalsModule,
    AdminModule,
    HealthModule,
  ],
})
export class AppModule {}
