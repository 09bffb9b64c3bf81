import { SetMetadata } from '@nestjs/common';

export const TIMEOUT_KEY = 'request-timeout-ms';

/**
 * Overrides the request deadline applied by TimeoutInterceptor for a handler
 * or controller (default 30s)
 */
export const Timeout = (timeoutMs: number) => SetMetadata(TIMEOUT_KEY, timeoutMs);
