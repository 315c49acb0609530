import { describe, expect, it } from 'vitest';
import { ConfigError } from '../core/errors.ts';
import { runOccupancyJob } from '../services/jobs/OccupancyJob.ts';
import { createFakeHttp, createTestLogger, occupancyPage, record } from './helpers.ts';

const INLINE_CONFIG = JSON.stringify([
  {
    name: 'down',
    brand: 'Boulder Co',
    url: 'https://down.example.test',
    id: 'acct-1',
    gyms: [{ shortcode: 'D1', location: 'Bradford' }],
  },
  {
    name: 'up',
    brand: 'Boulder Co',
    url: 'https://up.example.test',
    id: 'acct-2',
    timezone: 'Europe/London',
    gyms: [
      { shortcode: 'U1', location: 'Harrogate' },
      { shortcode: 'U2', location: 'Ripon' },
    ],
  },
]);

describe('runOccupancyJob', () => {
  it('loads the inline config and reports every endpoint', async () => {
    const { httpClient, requests } = createFakeHttp({
      'https://down.example.test/portal/public/acct-1/occupancy': () =>
        new Response('gone', { status: 404 }),
      'https://up.example.test/portal/public/acct-2/occupancy': () =>
        new Response(occupancyPage([record('U1', 120, 45, '6:10 PM')])),
    });

    const report = await runOccupancyJob({
      logger: createTestLogger().logger,
      httpClient,
      endpointSource: { inline: INLINE_CONFIG, filePath: 'does-not-exist.json' },
      fetcherOptions: { now: () => new Date('2024-01-15T19:00:00Z') },
    });

    expect(requests).toHaveLength(2);
    expect(report.summary).toMatchObject({ total: 2, successful: 1, failed: 1 });
    expect(report.failed[0]?.error).toMatchObject({ status: 404 });
    expect(report.gyms.map((gym) => [gym.shortCode, gym.data.count, gym.data.lastUpdate])).toEqual([
      ['U1', 45, new Date('2024-01-15T18:10:00Z')],
      ['U2', 0, null],
    ]);
  });

  it('rejects with ConfigError when the config cannot be read', async () => {
    const { httpClient, requests } = createFakeHttp({});

    await expect(
      runOccupancyJob({
        logger: createTestLogger().logger,
        httpClient,
        endpointSource: { inline: '{"not":"a list"}', filePath: 'does-not-exist.json' },
      })
    ).rejects.toBeInstanceOf(ConfigError);
    expect(requests).toHaveLength(0);
  });

  it('passes the orchestration options through', async () => {
    const { httpClient } = createFakeHttp({
      'https://up.example.test/portal/public/acct-2/occupancy': () =>
        new Response(occupancyPage([record('U2', 90, 12, '7:45 AM')])),
    });
    const { logger, lines } = createTestLogger();

    const report = await runOccupancyJob({
      logger,
      httpClient,
      endpointSource: { inline: INLINE_CONFIG, filePath: 'does-not-exist.json' },
      fetcherOptions: { now: () => new Date('2024-01-15T08:00:00Z') },
      orchestrationOptions: { concurrency: 1 },
    });

    expect(lines.find((line) => line.msg === 'Fetching 2 endpoints')?.concurrency).toBe(1);
    expect(report.summary.successful).toBe(1);
    expect(report.gyms.find((gym) => gym.shortCode === 'U2')?.data).toEqual({
      capacity: 90,
      count: 12,
      lastUpdate: new Date('2024-01-15T07:45:00Z'),
    });
  });
});
