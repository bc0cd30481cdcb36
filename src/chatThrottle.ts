import { sleep } from './utils';

export interface ThrottleOptions {
  /** Attempts per delivery, the first one included */
  maxAttempts: number;
  /** Cooldown when a 429 carries no retry_after */
  fallbackRetryAfterSec: number;
  wait: (ms: number) => Promise<void>;
  now: () => number;
}

const defaultOptions: ThrottleOptions = {
  maxAttempts: 2,
  fallbackRetryAfterSec: 30,
  wait: sleep,
  now: Date.now,
};

export function checkIsTooManyRequests(err: unknown): boolean {
  if (typeof err !== 'object' || err === null || !('response' in err)) return false;
  const { response } = err;
  return typeof response === 'object' && response !== null && 'error_code' in response && response.error_code === 429;
}

/** `parameters.retry_after` of a Bot API error, in seconds */
export function readRetryAfter(err: unknown): number | null {
  if (typeof err !== 'object' || err === null || !('response' in err)) return null;
  const { response } = err;
  if (typeof response !== 'object' || response === null || !('parameters' in response)) return null;
  const { parameters } = response;
  if (typeof parameters !== 'object' || parameters === null || !('retry_after' in parameters)) return null;
  return typeof parameters.retry_after === 'number' ? parameters.retry_after : null;
}

/**
 * @description Per-chat cooldowns for outgoing Telegram calls. A 429 puts
 * the chat on hold for the time Telegram asks for. The call is repeated
 * once the hold is over, up to `maxAttempts`, and later calls to the same
 * chat wait out whatever hold is left.
 */
export class ChatThrottle {
  private readonly holdUntil = new Map<number, number>();
  private readonly options: ThrottleOptions;

  constructor(options: Partial<ThrottleOptions> = {}) {
    this.options = { ...defaultOptions, ...options };
  }

  checkIsCoolingDown(chatId: number): boolean {
    return this.getHoldMs(chatId) > 0;
  }

  async run<T>(chatId: number, call: () => Promise<T>): Promise<T> {
    const { maxAttempts, fallbackRetryAfterSec, wait, now } = this.options;

    for (let attempt = 1; ; attempt++) {
      const holdMs = this.getHoldMs(chatId);
      if (holdMs > 0) {
        console.log(`[Throttle] Chat ${chatId} on hold, waiting ${Math.ceil(holdMs / 1000)}s`);
        await wait(holdMs);
      }

      try {
        const result = await call();
        this.holdUntil.delete(chatId);
        return result;
      } catch (err) {
        if (!checkIsTooManyRequests(err)) throw err;

        const retryAfterSec = readRetryAfter(err) ?? fallbackRetryAfterSec;
        this.holdUntil.set(chatId, now() + retryAfterSec * 1000);
        if (attempt >= maxAttempts) {
          console.error(`[Throttle] Chat ${chatId} still limited after ${attempt} attempts, holding ${retryAfterSec}s`);
          throw err;
        }
        console.log(`[Throttle] Chat ${chatId} hit 429 (attempt ${attempt}), retry in ${retryAfterSec}s`);
      }
    }
  }

  private getHoldMs(chatId: number): number {
    return (this.holdUntil.get(chatId) ?? 0) - this.options.now();
  }
}
