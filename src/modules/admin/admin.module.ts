import { Module } from '@nestjs/common';
import { MembershipModule } from '../membership/membership.module';
import { RenewalsModule } from '../renewals/renewals.module';
import { SubscriptionsModule } from '../subscriptions/subscriptions.module';
import { AdminController } from './admin.controller';
import { AdminService } from './admin.service';
import { AdminTokenGuard } from './admin-token.guard';

@Module({
  imports: [SubscriptionsModule, MembershipModule, RenewalsModule],
  controllers: [AdminController],
  providers: [AdminService, AdminTokenGuard],
})
export class AdminModule {}
