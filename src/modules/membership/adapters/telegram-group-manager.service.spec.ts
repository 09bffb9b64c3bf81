import { HttpService } from '@nestjs/axios';
import { AxiosError, AxiosHeaders, AxiosResponse } from 'axios';
import { of, throwError } from 'rxjs';
import { ProcessingLimitsService } from '../../../core/limits/processing-limits.service';
import { testConfig } from '../../../../test/support/test-config';
import { TelegramGroupManager } from './telegram-group-manager.service';

interface BotReply {
  ok: boolean;
  result?: unknown;
  error_code?: number;
  description?: string;
  parameters?: { retry_after?: number };
}

const API = 'https://api.telegram.org/bottest-bot-token';

const reply = (data: BotReply, status = 200): AxiosResponse<BotReply> => ({
  data,
  status,
  statusText: '',
  headers: {},
  config: { headers: new AxiosHeaders() },
});

const httpError = (data: BotReply, status: number) =>
  throwError(
    () =>
      new AxiosError(
        `Request failed with status code ${status}`,
        'ERR_BAD_REQUEST',
        undefined,
        undefined,
        reply(data, status),
      ),
  );

describe('TelegramGroupManager', () => {
  let http: HttpService;
  let manager: TelegramGroupManager;

  beforeEach(() => {
    const config = testConfig({
      GROUP_MANAGER: 'telegram',
      TELEGRAM_BOT_TOKEN: 'test-bot-token',
      TELEGRAM_GROUP_ID: '-100123',
      GROUP_API_TIMEOUT_MS: 2000,
    });
    http = new HttpService();
    manager = new TelegramGroupManager(http, config, new ProcessingLimitsService(config));
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should unban, create a one-off invite and send it to the user', async () => {
    jest.spyOn(Date, 'now').mockReturnValue(1_700_000_000_000);
    const post = jest
      .spyOn(http, 'post')
      .mockReturnValueOnce(of(reply({ ok: true, result: true })))
      .mockReturnValueOnce(
        of(reply({ ok: true, result: { invite_link: 'https://t.me/+invite' } })),
      )
      .mockReturnValueOnce(of(reply({ ok: true, result: { message_id: 1 } })));

    await expect(manager.addMember('42')).resolves.toEqual({ ok: true });

    expect(post.mock.calls).toEqual([
      [
        `${API}/unbanChatMember`,
        { chat_id: '-100123', user_id: '42', only_if_banned: true },
        { timeout: 2000 },
      ],
      [
        `${API}/createChatInviteLink`,
        { chat_id: '-100123', member_limit: 1, expire_date: 1_700_086_400 },
        { timeout: 2000 },
      ],
      [
        `${API}/sendMessage`,
        {
          chat_id: '42',
          text: 'Your subscription is active. Join the group: https://t.me/+invite',
        },
        { timeout: 2000 },
      ],
    ]);
  });

  it('should report rate limiting as transient with the advertised delay', async () => {
    jest.spyOn(http, 'post').mockReturnValueOnce(
      httpError(
        {
          ok: false,
          error_code: 429,
          description: 'Too Many Requests: retry after 7',
          parameters: { retry_after: 7 },
        },
        429,
      ),
    );

    await expect(manager.addMember('42')).resolves.toEqual({
      ok: false,
      transient: true,
      message: 'unbanChatMember: Too Many Requests: retry after 7',
      retryAfterMs: 7000,
    });
  });

  it('should treat a user who blocked the bot as permanent', async () => {
    jest
      .spyOn(http, 'post')
      .mockReturnValueOnce(of(reply({ ok: true, result: true })))
      .mockReturnValueOnce(
        of(reply({ ok: true, result: { invite_link: 'https://t.me/+invite' } })),
      )
      .mockReturnValueOnce(
        httpError(
          { ok: false, error_code: 403, description: 'Forbidden: bot was blocked by the user' },
          403,
        ),
      );

    await expect(manager.addMember('42')).resolves.toEqual({
      ok: false,
      transient: false,
      message: 'sendMessage: Forbidden: bot was blocked by the user',
    });
  });

  it('should retry when no invite link comes back', async () => {
    jest
      .spyOn(http, 'post')
      .mockReturnValueOnce(of(reply({ ok: true, result: true })))
      .mockReturnValueOnce(of(reply({ ok: true, result: {} })));

    await expect(manager.addMember('42')).resolves.toEqual({
      ok: false,
      transient: true,
      message: 'createChatInviteLink returned no link',
    });
  });

  it('should ban then unban on removal', async () => {
    const post = jest
      .spyOn(http, 'post')
      .mockReturnValue(of(reply({ ok: true, result: true })));

    await expect(manager.removeMember('42')).resolves.toEqual({ ok: true });

    expect(post.mock.calls.map(([url]) => url)).toEqual([
      `${API}/banChatMember`,
      `${API}/unbanChatMember`,
    ]);
  });

  it('should classify a rejected reply by its error code', async () => {
    jest.spyOn(http, 'post').mockReturnValueOnce(
      of(reply({ ok: false, error_code: 400, description: 'Bad Request: chat not found' })),
    );

    await expect(manager.removeMember('42')).resolves.toEqual({
      ok: false,
      transient: false,
      message: 'banChatMember: Bad Request: chat not found',
    });
  });

  it('should treat a server error as transient', async () => {
    jest
      .spyOn(http, 'post')
      .mockReturnValueOnce(
        httpError({ ok: false, error_code: 502, description: 'Bad Gateway' }, 502),
      );

    await expect(manager.removeMember('42')).resolves.toEqual({
      ok: false,
      transient: true,
      message: 'banChatMember: Bad Gateway',
    });
  });

  it('should treat a connection failure as transient', async () => {
    jest
      .spyOn(http, 'post')
      .mockReturnValueOnce(throwError(() => new AxiosError('socket hang up', 'ECONNRESET')));

    await expect(manager.removeMember('42')).resolves.toEqual({
      ok: false,
      transient: true,
      message: 'banChatMember: socket hang up',
    });
  });

  it('should refuse to start without a bot token and group', () => {
    const unconfigured = new TelegramGroupManager(
      http,
      testConfig(),
      new ProcessingLimitsService(testConfig()),
    );

    expect(() => unconfigured.assertConfigured()).toThrow(
      'TELEGRAM_BOT_TOKEN and TELEGRAM_GROUP_ID are required when GROUP_MANAGER=telegram',
    );
  });
});
