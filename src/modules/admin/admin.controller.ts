import {
  Body,
  Controller,
  Get,
  HttpCode,
  NotFoundException,
  Param,
  ParseUUIDPipe,
  Post,
  Put,
  Query,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { Timeout } from '../../core/timeout/timeout.decorator';
import { TimeoutInterceptor } from '../../core/timeout/timeout.interceptor';
import { MembershipIntent, Plan } from '../../domain/subscriptions';
import { MembershipSyncReport, MembershipSyncService } from '../membership/membership-sync.service';
import { RenewalSweeperService, SweepReport } from '../renewals/renewal-sweeper.service';
import { PlansService } from '../subscriptions/plans.service';
import { AdminService } from './admin.service';
import { AdminTokenGuard } from './admin-token.guard';
import { FailedIntentsQueryDto } from './dto/failed-intents-query.dto';
import { UpdatePlanPriceDto } from './dto/update-plan-price.dto';

@Controller('admin')
@UseGuards(AdminTokenGuard)
@UseInterceptors(TimeoutInterceptor)
export class AdminController {
  constructor(
    private readonly plansService: PlansService,
    private readonly adminService: AdminService,
    private readonly membershipSync: MembershipSyncService,
    private readonly renewalSweeper: RenewalSweeperService,
  ) {}

  /**
   * PUT /api/admin/plans/:planId/price
   *
   * Body: { "amountMinor": 1299, "returningAmountMinor": 999, "currency": "USD" }
   *
   * Existing subscriptions keep the price they were created with.
   */
  @Put('plans/:planId/price')
  async updatePrice(
    @Param('planId') planId: string,
    @Body() body: UpdatePlanPriceDto,
  ): Promise<Plan> {
    return this.plansService.updatePrice(planId, body);
  }

  /**
   * GET /api/admin/membership-intents/failed?limit=100
   *
   * Memberships that could not be synced and need an operator
   */
  @Get('membership-intents/failed')
  async listFailedIntents(
    @Query() query: FailedIntentsQueryDto,
  ): Promise<{ total: number; intents: MembershipIntent[] }> {
    return this.adminService.listFailedIntents(query.limit ?? 100);
  }

  /**
   * POST /api/admin/membership-intents/:id/retry
   *
   * Re-queues a failed intent with a fresh attempt budget and runs the
   * synchronizer once
   */
  @Post('membership-intents/:id/retry')
  @HttpCode(200)
  async retryIntent(
    @Param('id', new ParseUUIDPipe()) id: string,
  ): Promise<{ intent: MembershipIntent; sync: MembershipSyncReport }> {
    const intent = await this.adminService.requeueFailedIntent(id);
    if (!intent) {
      throw new NotFoundException(`No failed membership intent ${id}`);
    }
    return { intent, sync: await this.membershipSync.runOnce() };
  }

  /**
   * POST /api/admin/membership-sync
   */
  @Post('membership-sync')
  @HttpCode(200)
  async runMembershipSync(): Promise<MembershipSyncReport> {
    return this.membershipSync.runOnce();
  }

  /**
   * POST /api/admin/sweeps/renewal
   *
   * Runs the renewal sweep now; joins the running sweep if there is one
   */
  @Post('sweeps/renewal')
  @HttpCode(200)
  @Timeout(300000)
  async runRenewalSweep(): Promise<SweepReport> {
    return this.renewalSweeper.runSweep();
  }
}
