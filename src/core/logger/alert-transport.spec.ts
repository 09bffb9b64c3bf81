import axios from 'axios';
import { AlertTransport } from './alert-transport';

const writeLine = (transport: AlertTransport, line: Record<string, unknown>) =>
  new Promise<void>((resolve, reject) => {
    transport.write(JSON.stringify(line), (error) => (error ? reject(error) : resolve()));
  });

const alertLine = {
  level: 50,
  time: 1709251200000,
  pid: 1,
  hostname: 'worker-1',
  msg: 'Membership change could not be applied; manual action required',
  alert: 'membership_sync_failed',
  userId: 'user-1',
  attemptCount: 8,
};

describe('AlertTransport', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should parse pino JSON lines and skip anything else', () => {
    expect(AlertTransport.parse('{"level":30,"msg":"hi"}')).toEqual({ level: 30, msg: 'hi' });
    expect(AlertTransport.parse('plain text')).toBeNull();
    expect(AlertTransport.parse('{"msg":"no level"}')).toBeNull();
  });

  it('should forward only tagged lines at error level or above', () => {
    const transport = new AlertTransport('https://hooks.example.invalid/alerts');

    expect(transport.shouldForward({ level: 50, alert: 'x' })).toBe(true);
    expect(transport.shouldForward({ level: 'fatal', alert: 'x' })).toBe(true);
    expect(transport.shouldForward({ level: 50 })).toBe(false);
    expect(transport.shouldForward({ level: 40, alert: 'x' })).toBe(false);
  });

  it('should format the alert with its context fields', () => {
    const transport = new AlertTransport('https://hooks.example.invalid/alerts');

    expect(transport.formatMessage(alertLine)).toBe(
      [
        ':rotating_light: [membership_sync_failed] Membership change could not be applied; manual action required',
        '• userId: "user-1"',
        '• attemptCount: 8',
      ].join('\n'),
    );
  });

  it('should post alerts and drop the ones over the per-minute limit', async () => {
    const post = jest.spyOn(axios, 'post').mockResolvedValue({ status: 200 });
    const transport = new AlertTransport('https://hooks.example.invalid/alerts', 1);

    await writeLine(transport, { ...alertLine, level: 30 });
    await writeLine(transport, alertLine);
    await writeLine(transport, alertLine);

    expect(post).toHaveBeenCalledTimes(1);
    expect(post).toHaveBeenCalledWith(
      'https://hooks.example.invalid/alerts',
      { text: transport.formatMessage(alertLine) },
      { timeout: 5000 },
    );
  });

  it('should keep accepting lines when delivery fails', async () => {
    jest.spyOn(axios, 'post').mockRejectedValue(new Error('connect ECONNREFUSED'));
    const stderr = jest.spyOn(process.stderr, 'write').mockReturnValue(true);
    const transport = new AlertTransport('https://hooks.example.invalid/alerts');

    await writeLine(transport, alertLine);

    expect(stderr).toHaveBeenCalledWith('alert delivery failed: connect ECONNREFUSED\n');
  });
});
