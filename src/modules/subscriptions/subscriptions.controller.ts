import {
  Body,
  Controller,
  Get,
  HttpCode,
  NotFoundException,
  Param,
  Patch,
  Post,
  UseInterceptors,
} from '@nestjs/common';
import { TimeoutInterceptor } from '../../core/timeout/timeout.interceptor';
import { AutoRenewDto } from './dto/auto-renew.dto';
import { StartSubscriptionDto } from './dto/start-subscription.dto';
import {
  StartSubscriptionResponseDto,
  SubscriptionResponseDto,
  SubscriptionStatusResponseDto,
  toStatusResponse,
  toSubscriptionResponse,
} from './dto/subscription-response.dto';
import { LifecycleService } from './lifecycle.service';

@Controller('subscriptions')
@UseInterceptors(TimeoutInterceptor)
export class SubscriptionsController {
  constructor(private readonly lifecycleService: LifecycleService) {}

  /**
   * POST /api/subscriptions
   *
   * Starts (or resumes) checkout for a user. A pending subscription is
   * reused, so repeating the call returns the same payment link.
   *
   * Body: { "userId": "123456789", "planId": "default" }
   *
   * Response (201):
   * {
   *   "subscription": { "id": "...", "state": "pending", ... },
   *   "reused": false,
   *   "payment": { "paymentId": "...", "paymentUrl": "https://...", ... },
   *   "paymentError": null
   * }
   *
   * 409 when the user already has an active or grace-period subscription
   */
  @Post()
  async start(
    @Body() body: StartSubscriptionDto,
  ): Promise<StartSubscriptionResponseDto> {
    const result = await this.lifecycleService.startSubscription(
      body.userId,
      body.planId,
    );
    return {
      subscription: toSubscriptionResponse(result.subscription),
      reused: result.reused,
      payment: result.payment,
      paymentError: result.paymentError,
    };
  }

  /**
   * POST /api/subscriptions/:userId/cancel
   *
   * Cancels immediately and revokes group access
   */
  @Post(':userId/cancel')
  @HttpCode(200)
  async cancel(@Param('userId') userId: string): Promise<SubscriptionResponseDto> {
    return toSubscriptionResponse(await this.lifecycleService.cancel(userId));
  }

  /**
   * PATCH /api/subscriptions/:userId/auto-renew
   *
   * Body: { "enabled": false }
   */
  @Patch(':userId/auto-renew')
  async setAutoRenew(
    @Param('userId') userId: string,
    @Body() body: AutoRenewDto,
  ): Promise<SubscriptionResponseDto> {
    return toSubscriptionResponse(
      await this.lifecycleService.setAutoRenew(userId, body.enabled),
    );
  }

  @Get(':userId')
  async getStatus(
    @Param('userId') userId: string,
  ): Promise<SubscriptionStatusResponseDto> {
    const view = await this.lifecycleService.getStatus(userId);
    if (!view) {
      throw new NotFoundException(`No subscription for user ${userId}`);
    }
    return toStatusResponse(view);
  }
}
