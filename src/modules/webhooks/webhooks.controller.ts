import {
  Controller,
  HttpCode,
  HttpException,
  HttpStatus,
  NotFoundException,
  Param,
  Post,
  RawBodyRequest,
  Req,
} from '@nestjs/common';
import { Request } from 'express';
import {
  ReconcileResult,
  RejectionReason,
  WebhookReconcilerService,
} from './webhook-reconciler.service';

const STATUS_BY_REASON: Record<RejectionReason, HttpStatus> = {
  invalid_signature: HttpStatus.UNAUTHORIZED,
  malformed_payload: HttpStatus.BAD_REQUEST,
  invalid_transition: HttpStatus.CONFLICT,
  unknown_subscription: HttpStatus.CONFLICT,
};

@Controller('webhooks')
export class WebhooksController {
  constructor(private readonly reconciler: WebhookReconcilerService) {}

  /**
   * POST /api/webhooks/:provider
   *
   * Signature is checked over the exact raw body, so the app must be created
   * with `rawBody: true`.
   *
   * Response (200):
   * { "outcome": "accepted", "providerEventId": "evt_1", "duplicate": false, ... }
   *
   * Rejections: 401 invalid_signature, 400 malformed_payload,
   * 409 invalid_transition / unknown_subscription. Lock contention answers
   * 503 so the provider redelivers.
   */
  @Post(':provider')
  @HttpCode(200)
  async receive(
    @Param('provider') provider: string,
    @Req() request: RawBodyRequest<Request>,
  ): Promise<ReconcileResult> {
    if (provider !== this.reconciler.providerName) {
      throw new NotFoundException(`No webhook endpoint for provider ${provider}`);
    }

    const signature = request.header(this.reconciler.signatureHeader);
    const result = await this.reconciler.handle(
      request.rawBody ?? Buffer.alloc(0),
      signature,
    );

    if (result.outcome === 'rejected') {
      throw new HttpException(result, STATUS_BY_REASON[result.reason]);
    }
    return result;
  }
}
