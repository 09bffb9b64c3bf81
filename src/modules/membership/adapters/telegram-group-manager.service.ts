import { HttpService } from '@nestjs/axios';
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { isAxiosError } from 'axios';
import { firstValueFrom } from 'rxjs';
import { errorMessage } from '../../../core/errors/subscription.errors';
import { ProcessingLimitsService } from '../../../core/limits/processing-limits.service';
import { logger } from '../../../core/logger/logger.config';
import { parseRetryAfter } from '../../../core/utils/delay.util';
import { GroupCallResult, GroupManager } from '../../../domain/subscriptions';

interface TelegramApiResponse<T> {
  ok: boolean;
  result?: T;
  error_code?: number;
  description?: string;
  parameters?: { retry_after?: number };
}

interface TelegramInviteLink {
  invite_link: string;
}

type TelegramCall<T> =
  | { ok: true; result: T | undefined }
  | Extract<GroupCallResult, { ok: false }>;

const INVITE_TTL_SECONDS = 24 * 60 * 60;

/**
 * Bot API error -> transient/permanent. 429 and 5xx are retried; other 4xx
 * (bad chat id, bot lacks rights, user blocked the bot) need an operator.
 */
const classifyFailure = (
  method: string,
  status: number | undefined,
  body: TelegramApiResponse<unknown> | undefined,
  fallbackMessage: string,
): Extract<GroupCallResult, { ok: false }> => {
  const code = body?.error_code ?? status;
  const message = `${method}: ${body?.description ?? fallbackMessage}`;

  if (code === 429) {
    return {
      ok: false,
      transient: true,
      message,
      retryAfterMs: parseRetryAfter(body?.parameters?.retry_after),
    };
  }
  if (code === undefined || code >= 500) {
    return { ok: false, transient: true, message };
  }
  return { ok: false, transient: false, message };
};

@Injectable()
export class TelegramGroupManager implements GroupManager {
  private readonly logger = logger();
  readonly name = 'telegram';

  private readonly baseUrl: string;
  private readonly groupId: string;

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
    private readonly limitsService: ProcessingLimitsService,
  ) {
    const token = this.configService.get<string>('TELEGRAM_BOT_TOKEN') || '';
    this.baseUrl = `https://api.telegram.org/bot${token}`;
    this.groupId = this.configService.get<string>('TELEGRAM_GROUP_ID') || '';
  }

  assertConfigured(): void {
    if (!this.configService.get<string>('TELEGRAM_BOT_TOKEN') || !this.groupId) {
      throw new Error(
        'TELEGRAM_BOT_TOKEN and TELEGRAM_GROUP_ID are required when GROUP_MANAGER=telegram',
      );
    }
  }

  /**
   * Lifts any earlier ban, then sends the user a single-use invite link.
   * Repeating the call sends a fresh link, which is harmless.
   */
  async addMember(userId: string): Promise<GroupCallResult> {
    const unban = await this.call('unbanChatMember', {
      chat_id: this.groupId,
      user_id: userId,
      only_if_banned: true,
    });
    if (!unban.ok) return unban;

    const invite = await this.call<TelegramInviteLink>('createChatInviteLink', {
      chat_id: this.groupId,
      member_limit: 1,
      expire_date: Math.floor(Date.now() / 1000) + INVITE_TTL_SECONDS,
    });
    if (!invite.ok) return invite;
    if (!invite.result?.invite_link) {
      return {
        ok: false,
        transient: true,
        message: 'createChatInviteLink returned no link',
      };
    }

    const message = await this.call('sendMessage', {
      chat_id: userId,
      text: `Your subscription is active. Join the group: ${invite.result.invite_link}`,
    });
    return message.ok ? { ok: true } : message;
  }

  /**
   * Ban then unban: removes the user from the group but lets them rejoin
   * with a new invite after subscribing again
   */
  async removeMember(userId: string): Promise<GroupCallResult> {
    const ban = await this.call('banChatMember', {
      chat_id: this.groupId,
      user_id: userId,
    });
    if (!ban.ok) return ban;

    const unban = await this.call('unbanChatMember', {
      chat_id: this.groupId,
      user_id: userId,
      only_if_banned: true,
    });
    return unban.ok ? { ok: true } : unban;
  }

  private async call<T = true>(
    method: string,
    payload: Record<string, unknown>,
  ): Promise<TelegramCall<T>> {
    try {
      const response = await firstValueFrom(
        this.httpService.post<TelegramApiResponse<T>>(
          `${this.baseUrl}/${method}`,
          payload,
          { timeout: this.limitsService.getGroupApiTimeout() },
        ),
      );

      if (response.data.ok) {
        return { ok: true, result: response.data.result };
      }
      return classifyFailure(method, response.status, response.data, 'request rejected');
    } catch (error) {
      if (isAxiosError<TelegramApiResponse<unknown>>(error)) {
        const failure = classifyFailure(
          method,
          error.response?.status,
          error.response?.data,
          error.message,
        );
        this.logger.warn(
          { method, status: error.response?.status, transient: failure.transient },
          'Telegram API call failed',
        );
        return failure;
      }
      return { ok: false, transient: true, message: `${method}: ${errorMessage(error)}` };
    }
  }
}
