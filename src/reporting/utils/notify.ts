import retry from 'async-await-retry';
import axios from 'axios';
import { Logger } from '@nestjs/common';
import { CycleAbortedError } from '../../dex/errors';
import { safeStringify } from '../../utils/bigintSerializer';
import { withDeadline } from '../../utils/deadline';

const logger = new Logger('Notify');

// per request
export const NOTIFY_TIMEOUT_MS = 10_000;
// whole delivery, retries included
export const NOTIFY_DEADLINE_MS = 60_000;

export interface NotifyData {
  lines: string[];
  data?: unknown;
}

/**
 * Post to a Discord webhook. Gives up after NOTIFY_DEADLINE_MS or when
 * `signal` aborts. Failures are logged, never thrown.
 */
export async function sendNotify(
  webhook: string,
  notify: NotifyData,
  signal?: AbortSignal,
) {
  const content = notify.lines.map((line) => line.trim());
  if (notify.data !== undefined) {
    content.push(`Trade Data: \`${safeStringify(notify.data)}\``);
  }

  try {
    await withDeadline(
      retry(
        async () => {
          await axios.post(
            webhook,
            { content: content.join('\n') },
            { timeout: NOTIFY_TIMEOUT_MS, signal },
          );
        },
        undefined,
        {
          retriesMax: 4,
          interval: 2000,
          exponential: false,
        },
      ),
      NOTIFY_DEADLINE_MS,
      () => new Error(`gave up after ${NOTIFY_DEADLINE_MS}ms`),
      signal,
    );
    logger.log('Notification sent to Discord.');
  } catch (error) {
    if (error instanceof CycleAbortedError) {
      logger.warn('Notification to Discord cancelled on shutdown');
      return;
    }
    logger.error('Error sending notification to Discord', error);
  }
}
