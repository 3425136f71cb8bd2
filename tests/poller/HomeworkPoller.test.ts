/**
 * Tests for HomeworkPoller
 */

import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { HomeworkPoller } from '../../src/poller/HomeworkPoller.js';
import { ApiResponseError, HomeworkFieldError, ResponseShapeError } from '../../src/errors.js';
import type { FetchError } from '../../src/errors.js';
import type { Result } from '../../src/types.js';
import type { PollOutcome } from '../../src/poller/types.js';

const ENDPOINT = 'https://practicum.example.test/api/user_api/homework_statuses/';
const APPROVED_MESSAGE =
  'Изменился статус проверки работы "proj1". Работа проверена: ревьюеру всё понравилось. Ура!';
const REVIEWING_MESSAGE =
  'Изменился статус проверки работы "proj1". Работа взята на проверку ревьюером.';

function response(value: unknown): Result<unknown, FetchError> {
  return { ok: true, value };
}

describe('HomeworkPoller', () => {
  let fetchStatus: Mock<(timestamp: number) => Promise<Result<unknown, FetchError>>>;
  let notify: Mock<(message: string) => Promise<boolean>>;
  let poller: HomeworkPoller;

  beforeEach(() => {
    fetchStatus = vi.fn<(timestamp: number) => Promise<Result<unknown, FetchError>>>();
    notify = vi.fn<(message: string) => Promise<boolean>>().mockResolvedValue(true);

    poller = new HomeworkPoller(
      { retryPeriodMs: 600000, initialTimestamp: 500 },
      { source: { fetchStatus }, notifier: { notify } }
    );
  });

  describe('pollOnce', () => {
    it('should notify a status change and advance the cursor', async () => {
      fetchStatus.mockResolvedValueOnce(
        response({ homeworks: [{ homework_name: 'proj1', status: 'approved' }], current_date: 1000 })
      );

      const outcome = await poller.pollOnce();

      expect(fetchStatus).toHaveBeenCalledWith(500);
      expect(outcome).toEqual({ status: 'notified', message: APPROVED_MESSAGE });
      expect(notify).toHaveBeenCalledWith(APPROVED_MESSAGE);
      expect(poller.getState()).toEqual({ timestamp: 1000, lastVerdict: APPROVED_MESSAGE });
    });

    it('should report only the first homework', async () => {
      fetchStatus.mockResolvedValueOnce(
        response({
          homeworks: [
            { homework_name: 'proj1', status: 'reviewing' },
            { homework_name: 'proj0', status: 'approved' },
          ],
          current_date: 1000,
        })
      );

      const outcome = await poller.pollOnce();

      expect(outcome).toEqual({ status: 'notified', message: REVIEWING_MESSAGE });
    });

    it('should notify the no new statuses text for an empty list', async () => {
      fetchStatus.mockResolvedValueOnce(response({ homeworks: [], current_date: 1000 }));

      const outcome = await poller.pollOnce();

      expect(outcome).toEqual({ status: 'notified', message: 'Нет новых статусов.' });
      expect(poller.getState().timestamp).toBe(1000);
    });

    it('should not notify the same message twice', async () => {
      fetchStatus
        .mockResolvedValueOnce(response({ homeworks: [], current_date: 1000 }))
        .mockResolvedValueOnce(response({ homeworks: [], current_date: 1600 }));

      await poller.pollOnce();
      const outcome = await poller.pollOnce();

      expect(outcome).toEqual({ status: 'unchanged', message: 'Нет новых статусов.' });
      expect(notify).toHaveBeenCalledTimes(1);
      expect(fetchStatus).toHaveBeenLastCalledWith(1000);
      expect(poller.getState()).toEqual({ timestamp: 1600, lastVerdict: 'Нет новых статусов.' });
    });

    it('should notify again when the status changes', async () => {
      fetchStatus
        .mockResolvedValueOnce(
          response({ homeworks: [{ homework_name: 'proj1', status: 'reviewing' }], current_date: 1000 })
        )
        .mockResolvedValueOnce(
          response({ homeworks: [{ homework_name: 'proj1', status: 'approved' }], current_date: 2000 })
        );

      await poller.pollOnce();
      const outcome = await poller.pollOnce();

      expect(outcome).toEqual({ status: 'notified', message: APPROVED_MESSAGE });
      expect(notify).toHaveBeenNthCalledWith(1, REVIEWING_MESSAGE);
      expect(notify).toHaveBeenNthCalledWith(2, APPROVED_MESSAGE);
    });

    it('should keep the cursor when current_date is missing', async () => {
      fetchStatus.mockResolvedValueOnce(
        response({ homeworks: [{ homework_name: 'proj1', status: 'approved' }] })
      );

      await poller.pollOnce();

      expect(poller.getState().timestamp).toBe(500);
    });

    it('should leave state unchanged when delivery fails', async () => {
      fetchStatus.mockResolvedValue(
        response({ homeworks: [{ homework_name: 'proj1', status: 'approved' }], current_date: 1000 })
      );
      notify.mockResolvedValueOnce(false);

      const failed = await poller.pollOnce();

      expect(failed).toEqual({ status: 'delivery_failed', message: APPROVED_MESSAGE });
      expect(poller.getState()).toEqual({ timestamp: 500, lastVerdict: null });

      const retried = await poller.pollOnce();

      expect(retried).toEqual({ status: 'notified', message: APPROVED_MESSAGE });
      expect(fetchStatus).toHaveBeenLastCalledWith(500);
      expect(notify).toHaveBeenCalledTimes(2);
    });

    it('should relay an unknown status as a failure and keep the cursor', async () => {
      fetchStatus.mockResolvedValueOnce(
        response({ homeworks: [{ homework_name: 'x', status: 'unknown' }] })
      );

      const outcome = await poller.pollOnce();

      expect(outcome.status).toBe('failed');
      if (outcome.status !== 'failed') return;
      expect(outcome.error).toBeInstanceOf(HomeworkFieldError);
      expect(outcome.message).toBe(
        'Сбой в работе программы: Неизвестный статус домашней работы: unknown'
      );
      expect(outcome.notified).toBe(true);
      expect(notify).toHaveBeenCalledWith(outcome.message);
      expect(poller.getState().timestamp).toBe(500);
    });

    it('should relay the same failure only once', async () => {
      fetchStatus.mockResolvedValue(response({ current_date: 1000 }));

      const first = await poller.pollOnce();
      const second = await poller.pollOnce();

      const expected: PollOutcome = {
        status: 'failed',
        message: 'Сбой в работе программы: В ответе API отсутствует ключ "homeworks"',
        error: expect.any(ResponseShapeError),
        notified: true,
      };
      expect(first).toEqual(expected);
      expect(second).toEqual({ ...expected, notified: false });
      expect(notify).toHaveBeenCalledTimes(1);
      expect(poller.getState().timestamp).toBe(500);
    });

    it('should relay a fetch error', async () => {
      fetchStatus.mockResolvedValueOnce({
        ok: false,
        error: new ApiResponseError(`Эндпоинт ${ENDPOINT} вернул код 503`, 503, 'down'),
      });

      const outcome = await poller.pollOnce();

      expect(outcome.status).toBe('failed');
      expect(notify).toHaveBeenCalledWith(
        `Сбой в работе программы: Эндпоинт ${ENDPOINT} вернул код 503`
      );
    });

    it('should catch unexpected exceptions from the source', async () => {
      fetchStatus.mockRejectedValueOnce(new Error('boom'));

      const outcome = await poller.pollOnce();

      expect(outcome).toEqual({
        status: 'failed',
        message: 'Сбой в работе программы: boom',
        error: new Error('boom'),
        notified: true,
      });
    });

    it('should retry an undelivered failure message next time', async () => {
      fetchStatus.mockResolvedValue(response(null));
      notify.mockResolvedValueOnce(false);

      const first = await poller.pollOnce();
      const second = await poller.pollOnce();

      expect(first.status === 'failed' && first.notified).toBe(false);
      expect(second.status === 'failed' && second.notified).toBe(true);
      expect(poller.getState().lastVerdict).toBe('Сбой в работе программы: Пустой ответ API');
    });

    it('should re-send a verdict after a failure was relayed', async () => {
      const approved = response({
        homeworks: [{ homework_name: 'proj1', status: 'approved' }],
        current_date: 1000,
      });
      fetchStatus
        .mockResolvedValueOnce(approved)
        .mockResolvedValueOnce(response({}))
        .mockResolvedValueOnce(approved);

      await poller.pollOnce();
      await poller.pollOnce();
      const outcome = await poller.pollOnce();

      expect(outcome).toEqual({ status: 'notified', message: APPROVED_MESSAGE });
      expect(notify).toHaveBeenCalledTimes(3);
    });
  });

  describe('start/stop', () => {
    it('should sleep after every iteration until stopped', async () => {
      let sleeps = 0;
      const sleep = vi.fn((_ms: number, signal: AbortSignal) => {
        sleeps++;
        if (sleeps < 3) return Promise.resolve();
        return new Promise<void>((resolve) => {
          signal.addEventListener('abort', () => resolve(), { once: true });
        });
      });
      fetchStatus.mockResolvedValue(response({ homeworks: [], current_date: 1000 }));

      const loopingPoller = new HomeworkPoller(
        { retryPeriodMs: 600000, initialTimestamp: 500 },
        { source: { fetchStatus }, notifier: { notify }, sleep }
      );
      const outcomes: PollOutcome[] = [];
      const stoppedHandler = vi.fn();
      loopingPoller.on('polled', (outcome) => outcomes.push(outcome));
      loopingPoller.on('stopped', stoppedHandler);

      loopingPoller.start();
      await vi.waitFor(() => expect(sleep).toHaveBeenCalledTimes(3));
      await loopingPoller.stop();

      expect(fetchStatus).toHaveBeenCalledTimes(3);
      expect(sleep).toHaveBeenCalledWith(600000, expect.any(AbortSignal));
      expect(outcomes.map((outcome) => outcome.status)).toEqual(['notified', 'unchanged', 'unchanged']);
      expect(stoppedHandler).toHaveBeenCalledTimes(1);
    });

    it('should keep polling after a failed iteration', async () => {
      let sleeps = 0;
      const sleep = vi.fn((_ms: number, signal: AbortSignal) => {
        sleeps++;
        if (sleeps < 2) return Promise.resolve();
        return new Promise<void>((resolve) => {
          signal.addEventListener('abort', () => resolve(), { once: true });
        });
      });
      fetchStatus
        .mockRejectedValueOnce(new Error('boom'))
        .mockResolvedValueOnce(response({ homeworks: [], current_date: 1000 }));

      const loopingPoller = new HomeworkPoller(
        { retryPeriodMs: 1000, initialTimestamp: 500 },
        { source: { fetchStatus }, notifier: { notify }, sleep }
      );

      loopingPoller.start();
      await vi.waitFor(() => expect(sleep).toHaveBeenCalledTimes(2));
      await loopingPoller.stop();

      expect(notify).toHaveBeenNthCalledWith(1, 'Сбой в работе программы: boom');
      expect(notify).toHaveBeenNthCalledWith(2, 'Нет новых статусов.');
      expect(loopingPoller.getState().timestamp).toBe(1000);
    });

    it('should ignore a second start', async () => {
      const sleep = vi.fn(
        (_ms: number, signal: AbortSignal) =>
          new Promise<void>((resolve) => {
            signal.addEventListener('abort', () => resolve(), { once: true });
          })
      );
      fetchStatus.mockResolvedValue(response({ homeworks: [], current_date: 1000 }));

      const loopingPoller = new HomeworkPoller(
        { retryPeriodMs: 1000, initialTimestamp: 500 },
        { source: { fetchStatus }, notifier: { notify }, sleep }
      );

      loopingPoller.start();
      loopingPoller.start();
      await vi.waitFor(() => expect(sleep).toHaveBeenCalledTimes(1));
      await loopingPoller.stop();

      expect(fetchStatus).toHaveBeenCalledTimes(1);
    });

    it('should stop once when stop is called concurrently', async () => {
      const sleep = vi.fn(
        (_ms: number, signal: AbortSignal) =>
          new Promise<void>((resolve) => {
            signal.addEventListener('abort', () => resolve(), { once: true });
          })
      );
      fetchStatus.mockResolvedValue(response({ homeworks: [], current_date: 1000 }));

      const loopingPoller = new HomeworkPoller(
        { retryPeriodMs: 1000, initialTimestamp: 500 },
        { source: { fetchStatus }, notifier: { notify }, sleep }
      );
      const stoppedHandler = vi.fn();
      loopingPoller.on('stopped', stoppedHandler);

      loopingPoller.start();
      await vi.waitFor(() => expect(sleep).toHaveBeenCalledTimes(1));
      await Promise.all([loopingPoller.stop(), loopingPoller.stop()]);

      expect(stoppedHandler).toHaveBeenCalledTimes(1);
    });

    it('should restart after being stopped', async () => {
      const sleep = vi.fn(
        (_ms: number, signal: AbortSignal) =>
          new Promise<void>((resolve) => {
            signal.addEventListener('abort', () => resolve(), { once: true });
          })
      );
      fetchStatus.mockResolvedValue(response({ homeworks: [], current_date: 1000 }));

      const loopingPoller = new HomeworkPoller(
        { retryPeriodMs: 1000, initialTimestamp: 500 },
        { source: { fetchStatus }, notifier: { notify }, sleep }
      );

      loopingPoller.start();
      await vi.waitFor(() => expect(sleep).toHaveBeenCalledTimes(1));
      await loopingPoller.stop();
      loopingPoller.start();
      await vi.waitFor(() => expect(sleep).toHaveBeenCalledTimes(2));
      await loopingPoller.stop();

      expect(fetchStatus).toHaveBeenCalledTimes(2);
    });

    it('should resolve stop when not started', async () => {
      await expect(poller.stop()).resolves.toBeUndefined();
    });
  });
});
