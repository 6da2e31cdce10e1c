import { calculateDelay, withExponentialBackoff } from '@/lib/retry-utils';
import { Failure, Success, type Result } from '@/types';

function recordingSleep(): { sleep: (ms: number) => Promise<void>; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}

describe('retry-utils', () => {
  describe('calculateDelay', () => {
    it('doubles from the base delay', () => {
      const config = { baseDelayMs: 2000, exponentialBase: 2 };

      expect(calculateDelay(0, config)).toBe(2000);
      expect(calculateDelay(1, config)).toBe(4000);
      expect(calculateDelay(2, config)).toBe(8000);
    });
  });

  describe('withExponentialBackoff', () => {
    it('returns the first success without sleeping', async () => {
      const { sleep, delays } = recordingSleep();

      const outcome = await withExponentialBackoff(async () => Success('done'), { sleep });

      expect(outcome.result).toEqual({ ok: true, value: 'done' });
      expect(outcome.attempts).toBe(1);
      expect(delays).toEqual([]);
    });

    it('sleeps base and then twice base before a third-attempt success', async () => {
      const { sleep, delays } = recordingSleep();
      let calls = 0;

      const outcome = await withExponentialBackoff(
        async (): Promise<Result<string>> => {
          calls++;
          return calls < 3 ? Failure(`attempt ${calls} failed`) : Success('third time');
        },
        { maxAttempts: 3, baseDelayMs: 100, sleep },
      );

      expect(outcome.result).toEqual({ ok: true, value: 'third time' });
      expect(outcome.attempts).toBe(3);
      expect(delays).toEqual([100, 200]);
    });

    it('keeps the last failure after exhausting attempts', async () => {
      const { sleep, delays } = recordingSleep();
      let calls = 0;

      const outcome = await withExponentialBackoff(
        async (): Promise<Result<string>> => {
          calls++;
          return Failure(`attempt ${calls} failed`, { message: 'boom', hint: 'still broken' });
        },
        { maxAttempts: 3, baseDelayMs: 100, sleep },
      );

      expect(calls).toBe(3);
      expect(delays).toEqual([100, 200]);
      expect(outcome.result.ok).toBe(false);
      if (!outcome.result.ok) {
        expect(outcome.result.error).toBe('attempt 3 failed');
        expect(outcome.result.guidance?.hint).toBe('still broken');
      }
    });

    it('retries thrown errors and reports the last one', async () => {
      const { sleep } = recordingSleep();

      const outcome = await withExponentialBackoff(
        async (): Promise<Result<string>> => {
          throw new Error('socket hang up');
        },
        { maxAttempts: 2, baseDelayMs: 1, sleep },
      );

      expect(outcome.attempts).toBe(2);
      expect(outcome.result).toEqual({
        ok: false,
        error: 'All 2 retry attempts failed. Last error: socket hang up',
      });
    });

    it('uses the default attempts and delays when none are given', async () => {
      const { sleep, delays } = recordingSleep();

      const outcome = await withExponentialBackoff(async () => Failure<string>('nope'), { sleep });

      expect(outcome.attempts).toBe(3);
      expect(delays).toEqual([2000, 4000]);
      expect(outcome.result).toEqual({ ok: false, error: 'nope' });
    });

    it('reports each retry before sleeping', async () => {
      const { sleep } = recordingSleep();
      const retries: Array<{ attemptNumber: number; delay: number }> = [];

      await withExponentialBackoff(async () => Failure<string>('nope'), {
        maxAttempts: 3,
        baseDelayMs: 10,
        sleep,
        onRetry: ({ attemptNumber, delay }) => retries.push({ attemptNumber, delay }),
      });

      expect(retries).toEqual([
        { attemptNumber: 1, delay: 10 },
        { attemptNumber: 2, delay: 20 },
      ]);
    });
  });
});
