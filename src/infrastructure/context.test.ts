import { describe, expect, it } from 'vitest';

import { userId } from '@/core/types.js';
import {
  createFakeDirectory,
  createFakeUsageSource,
  createMemoryReporter,
  createMockLogger,
  createRecordingNotifier,
  makeConfig,
  makeEntry,
  makeUsage,
} from '@/testing/fixtures/audit.js';

import { createAppContext } from './context.js';

describe('createAppContext', () => {
  it('wires an auditor whose writes land in the configured SQLite ledger', async () => {
    const now = new Date('2026-03-02T08:00:00.000Z');
    const context = createAppContext(makeConfig(), createMockLogger(), {
      usageSource: createFakeUsageSource([makeUsage('alice', 0.6, '614.4G')]),
      directorySource: createFakeDirectory({ alice: makeEntry() }),
      notifier: createRecordingNotifier(),
      reporter: createMemoryReporter(),
      now: () => now,
    });

    try {
      await context.auditor.run({ group: 'scicomp', limitTib: 0.5, write: true });

      expect(await context.ledger.find(userId('alice'))).toEqual({
        userId: 'alice',
        lastNotifiedSize: '614.4G',
        lastNotifiedAt: now,
      });
    } finally {
      context.close();
    }
  });

  it('uses the configured sender and subject for warnings', async () => {
    const notifier = createRecordingNotifier();
    const config = makeConfig();
    const context = createAppContext(
      { ...config, email: { ...config.email, from: 'storage@example.org', subject: 'Home directory over quota' } },
      createMockLogger(),
      {
        usageSource: createFakeUsageSource([makeUsage('alice', 0.6)]),
        directorySource: createFakeDirectory({ alice: makeEntry() }),
        notifier,
        reporter: createMemoryReporter(),
      },
    );

    try {
      await context.auditor.run({ group: 'scicomp', limitTib: 0.5, write: true });
    } finally {
      context.close();
    }

    expect(notifier.sent[0]?.from).toBe('storage@example.org');
    expect(notifier.sent[0]?.subject).toBe('Home directory over quota');
  });
});
