// src/weather/services/condition-taxonomy.service.spec.ts

import { ConfigService } from '@nestjs/config';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import { ConditionTaxonomyService } from './condition-taxonomy.service';
import { WeatherCodesFormatError } from '../utils/condition-normalizer.util';

describe('ConditionTaxonomyService', () => {
  it('默认加载 config/weather-codes.json', () => {
    const service = new ConditionTaxonomyService(new ConfigService({}));

    expect(service.taxonomy.categories.map((c) => c.canonicalName)).toEqual([
      'Partly Cloudy',
      'Clear',
      'Cloudy',
      'Rainy',
      'Snowy',
      'Foggy',
      'Stormy',
    ]);
    expect(service.normalize('Light drizzle')).toBe('Rainy');
    expect(service.glyph('Snowy')).toBe('❄️');
  });

  it('只对外提供归一化和展示符号', () => {
    const service = new ConditionTaxonomyService(new ConfigService({}));
    const methods = Object.getOwnPropertyNames(ConditionTaxonomyService.prototype)
      .filter((name) => name !== 'constructor')
      .sort();

    expect(methods).toEqual(['glyph', 'normalize']);
    expect(service.taxonomy.tomorrowCodes['8000']).toBe('Thunderstorm');
  });

  describe('WEATHER_CODES_PATH', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(path.join(tmpdir(), 'weather-codes-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('应该从配置的路径加载', () => {
      const file = path.join(dir, 'codes.json');
      writeFileSync(
        file,
        JSON.stringify({
          wmo: { ranges: [{ min: 0, max: 99, condition: 'Haze' }] },
          conditions: [{ name: 'Hazy', keywords: ['HAZE'], glyph: '😶‍🌫️' }],
        }),
      );

      const service = new ConditionTaxonomyService(new ConfigService({ WEATHER_CODES_PATH: file }));

      expect(service.normalize('Light haze')).toBe('Hazy');
      expect(service.glyph('Hazy')).toBe('😶‍🌫️');
      expect(service.normalize('Sunny')).toBe('Sunny');
    });

    it('格式错误时启动失败', () => {
      const file = path.join(dir, 'codes.json');
      writeFileSync(file, JSON.stringify({ wmo: { ranges: [] }, conditions: [] }));

      expect(() => new ConditionTaxonomyService(new ConfigService({ WEATHER_CODES_PATH: file }))).toThrow(
        WeatherCodesFormatError,
      );
    });
  });
});
