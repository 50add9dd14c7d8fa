import { describe, expect, it } from 'vitest';
import fs from 'fs';
import path from 'path';
import { DEFAULT_NOTIFICATIONS_QUEUE_NAME, notificationsQueueName } from '@libs/core';

const firstImport = (relativePath: string): string | undefined =>
  fs
    .readFileSync(path.join(process.cwd(), relativePath), 'utf8')
    .split('\n')
    .find((line) => line.startsWith('import '));

describe('notifications queue name', () => {
  it('takes the configured name', () => {
    expect(notificationsQueueName({ QUEUE_NOTIFICATIONS_NAME: ' alerts ' })).toBe('alerts');
  });

  it('falls back when unset or blank', () => {
    expect(notificationsQueueName({})).toBe(DEFAULT_NOTIFICATIONS_QUEUE_NAME);
    expect(notificationsQueueName({ QUEUE_NOTIFICATIONS_NAME: '  ' })).toBe('signal-notifications');
  });

  it.each(['apps/worker/src/main.ts', 'scripts/backfill-outcomes.ts'])('%s loads .env before anything else', (file) => {
    expect(firstImport(file)).toBe("import 'dotenv/config';");
  });
});
