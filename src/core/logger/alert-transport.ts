import axios from 'axios';
import { Writable } from 'node:stream';

const LEVEL_VALUES: Record<string, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

export interface AlertLogLine {
  level: number | string;
  [key: string]: unknown;
}

/**
 * Forwards escalation log lines (error level and above, carrying an `alert`
 * tag) to an incoming-webhook endpoint such as Slack or Mattermost.
 *
 * Lines without the tag stay in stdout only. Delivery is capped per minute so
 * a burst of failures cannot flood the channel.
 */
export class AlertTransport extends Writable {
  private readonly maxMessagesPerMinute: number;
  private messagesInMinute = 0;
  private minuteStart = Date.now();
  private suppressed = 0;

  constructor(
    private readonly webhookUrl: string,
    maxMessagesPerMinute = 15,
  ) {
    super({ decodeStrings: false });
    this.maxMessagesPerMinute = maxMessagesPerMinute;
  }

  override _write(
    chunk: Buffer | string,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    const line = AlertTransport.parse(chunk.toString());
    if (line && this.shouldForward(line)) {
      this.forward(line).finally(() => callback());
      return;
    }
    callback();
  }

  static parse(raw: string): AlertLogLine | null {
    try {
      const parsed: unknown = JSON.parse(raw);
      if (
        typeof parsed === 'object' &&
        parsed !== null &&
        'level' in parsed &&
        (typeof parsed.level === 'number' || typeof parsed.level === 'string')
      ) {
        return { ...parsed, level: parsed.level };
      }
    } catch {
      return null;
    }
    return null;
  }

  shouldForward(line: AlertLogLine): boolean {
    const level =
      typeof line.level === 'string' ? (LEVEL_VALUES[line.level] ?? 0) : line.level;
    return level >= LEVEL_VALUES.error && typeof line.alert === 'string';
  }

  formatMessage(line: AlertLogLine): string {
    const { level, msg, alert, time, pid, hostname, ...context } = line;
    const title = typeof msg === 'string' ? msg : 'alert';
    const header = `:rotating_light: [${String(alert)}] ${title}`;
    const details = Object.entries(context)
      .map(([key, value]) => `• ${key}: ${JSON.stringify(value)}`)
      .join('\n');
    return details ? `${header}\n${details}` : header;
  }

  private async forward(line: AlertLogLine): Promise<void> {
    const now = Date.now();
    if (now - this.minuteStart >= 60_000) {
      this.minuteStart = now;
      this.messagesInMinute = 0;
    }

    if (this.messagesInMinute >= this.maxMessagesPerMinute) {
      this.suppressed++;
      return;
    }
    this.messagesInMinute++;

    let text = this.formatMessage(line);
    if (this.suppressed > 0) {
      text += `\n(${this.suppressed} earlier alert(s) suppressed by rate limit)`;
      this.suppressed = 0;
    }

    try {
      await axios.post(this.webhookUrl, { text }, { timeout: 5000 });
    } catch (error) {
      // the logger cannot log its own delivery failure without recursing
      process.stderr.write(
        `alert delivery failed: ${error instanceof Error ? error.message : String(error)}\n`,
      );
    }
  }
}
