// src/weather/services/fetch-orchestrator.service.spec.ts

import { ConfigService } from '@nestjs/config';
import {
  DEFAULT_SOURCE_TIMEOUT_MS,
  FetchOrchestratorService,
  readPositiveInt,
} from './fetch-orchestrator.service';
import { GeocodeResolverService } from './geocode-resolver.service';
import { WeatherSourceAdapter } from '../adapters/weather-source.adapter.interface';
import { GeocodeCache, Observation } from '../interfaces/weather.interface';
import { createMockSession, observation } from '../testing/weather-test.helpers';

/**
 * 可控的测试数据源
 */
class StubSource implements WeatherSourceAdapter {
  readonly seenCaches: GeocodeCache[] = [];
  readonly seenSignals: Array<AbortSignal | undefined> = [];

  constructor(
    private readonly name: string,
    private readonly run: () => Promise<Observation>,
  ) {}

  getName(): string {
    return this.name;
  }

  fetch(
    _city: string,
    _session: unknown,
    geocodeCache: GeocodeCache,
    signal?: AbortSignal,
  ): Promise<Observation> {
    this.seenCaches.push(geocodeCache);
    this.seenSignals.push(signal);
    return this.run();
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('FetchOrchestratorService', () => {
  let geocoder: GeocodeResolverService;
  let resolve: jest.SpyInstance;

  function createService(config: Record<string, string> = {}): FetchOrchestratorService {
    const { session } = createMockSession();
    return new FetchOrchestratorService(session, geocoder, new ConfigService(config));
  }

  beforeEach(() => {
    geocoder = new GeocodeResolverService();
    resolve = jest
      .spyOn(geocoder, 'resolve')
      .mockResolvedValue({ ok: true, value: { latitude: 52.52, longitude: 13.405 } });
  });

  it('结果顺序与数据源顺序一致（即使完成顺序不同）', async () => {
    const slow = new StubSource('Slow', async () => {
      await delay(30);
      return observation({ source: 'Slow', temperature: 1 });
    });
    const fast = new StubSource('Fast', async () => observation({ source: 'Fast', temperature: 2 }));

    const results = await createService().fetch('Berlin', [slow, fast], 'concurrent');

    expect(results.map((o) => o.source)).toEqual(['Slow', 'Fast']);
  });

  it('并发模式同时发出全部调用', async () => {
    const events: string[] = [];
    const make = (name: string) =>
      new StubSource(name, async () => {
        events.push(`start:${name}`);
        await delay(10);
        events.push(`end:${name}`);
        return observation({ source: name });
      });

    await createService().fetch('Berlin', [make('A'), make('B')], 'concurrent');

    expect(events.slice(0, 2)).toEqual(['start:A', 'start:B']);
  });

  it('顺序模式逐个调用', async () => {
    const events: string[] = [];
    const make = (name: string) =>
      new StubSource(name, async () => {
        events.push(`start:${name}`);
        await delay(5);
        events.push(`end:${name}`);
        return observation({ source: name });
      });

    await createService().fetch('Berlin', [make('A'), make('B')], 'sequential');

    expect(events).toEqual(['start:A', 'end:A', 'start:B', 'end:B']);
  });

  it('两种模式得到相同的结果（除耗时外）', async () => {
    const make = () => [
      new StubSource('A', async () => observation({ source: 'A', temperature: 10, humidity: 50, condition: 'Sunny' })),
      new StubSource('B', async () => observation({ source: 'B', error: 'HTTP 500' })),
    ];
    const service = createService();

    const concurrent = await service.fetch('Berlin', make(), 'concurrent');
    const sequential = await service.fetch('Berlin', make(), 'sequential');

    const strip = (list: Observation[]) => list.map(({ durationMs: _ignored, ...rest }) => rest);
    expect(strip(concurrent)).toEqual(strip(sequential));
  });

  it('每个结果都带有耗时', async () => {
    const source = new StubSource('A', async () => observation({ source: 'A' }));

    const [result] = await createService().fetch('Berlin', [source], 'concurrent');

    expect(result.durationMs).not.toBeNull();
    expect(result.durationMs).toBeGreaterThanOrEqual(0);
  });

  it('坐标只预解析一次并传给所有数据源', async () => {
    const a = new StubSource('A', async () => observation({ source: 'A' }));
    const b = new StubSource('B', async () => observation({ source: 'B' }));

    await createService().fetch('Berlin', [a, b], 'concurrent');

    expect(resolve).toHaveBeenCalledTimes(1);
    expect(a.seenCaches[0].get('Berlin')).toEqual({ latitude: 52.52, longitude: 13.405 });
    expect(b.seenCaches[0]).toBe(a.seenCaches[0]);
  });

  it('预解析失败时缓存为空', async () => {
    resolve.mockResolvedValueOnce({ ok: false, error: { kind: 'city-not-found' } });
    const a = new StubSource('A', async () => observation({ source: 'A' }));

    await createService().fetch('Atlantis', [a], 'sequential');

    expect(a.seenCaches[0].size).toBe(0);
  });

  it('超时的数据源不影响其他数据源', async () => {
    const hanging = new StubSource('Hanging', () => new Promise<Observation>(() => undefined));
    const healthy = new StubSource('Healthy', async () =>
      observation({ source: 'Healthy', temperature: 20, condition: 'Clear' }),
    );

    const results = await createService({ WEATHER_SOURCE_TIMEOUT_MS: '40' }).fetch(
      'Berlin',
      [hanging, healthy],
      'concurrent',
    );

    expect(results[0]).toMatchObject({ source: 'Hanging', error: 'timeout', temperature: 0, humidity: null });
    expect(results[0].durationMs).not.toBeNull();
    expect(results[1]).toMatchObject({ source: 'Healthy', error: null, temperature: 20 });
    expect(hanging.seenSignals[0]?.aborted).toBe(true);
  });

  it('数据源抛出异常时转换为错误结果', async () => {
    const broken = new StubSource('Broken', async () => {
      throw new Error('unexpected shape');
    });

    const [result] = await createService().fetch('Berlin', [broken], 'concurrent');

    expect(result).toMatchObject({
      source: 'Broken',
      error: 'data parsing error: unexpected shape',
      temperature: 0,
      humidity: null,
      condition: '',
    });
  });
});

describe('readPositiveInt', () => {
  it('应该读取正整数配置', () => {
    expect(readPositiveInt(new ConfigService({ KEY: '2500' }), 'KEY', DEFAULT_SOURCE_TIMEOUT_MS)).toBe(2500);
  });

  it.each(['', 'abc', '0', '-5', '1.5'])('无效值 %p 使用默认值', (value) => {
    expect(readPositiveInt(new ConfigService({ KEY: value }), 'KEY', 15000)).toBe(15000);
  });

  it('未配置时使用默认值', () => {
    expect(readPositiveInt(new ConfigService({}), 'KEY', 15000)).toBe(15000);
  });
});
