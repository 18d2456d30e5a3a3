// src/weather/utils/condition-normalizer.util.spec.ts

import {
  NO_DATA_GLYPH,
  WeatherCodesFormatError,
  conditionGlyph,
  mapTomorrowCode,
  mapWmoCode,
  normalizeCondition,
  parseConditionTaxonomy,
} from './condition-normalizer.util';
import { loadTaxonomy } from '../testing/weather-test.helpers';

describe('condition-normalizer', () => {
  const taxonomy = loadTaxonomy();

  describe('normalizeCondition', () => {
    it.each([
      ['Clear sky', 'Clear'],
      ['Sunny', 'Clear'],
      ['Partly cloudy', 'Partly Cloudy'],
      ['Overcast', 'Cloudy'],
      ['Light rain', 'Rainy'],
      ['Patchy light drizzle', 'Rainy'],
      ['Snow', 'Snowy'],
      ['Sleet showers', 'Snowy'],
      ['Fog', 'Foggy'],
      ['Mist', 'Foggy'],
      ['Thunderstorm', 'Stormy'],
    ])('应该把 %s 归一化为 %s', (input, expected) => {
      expect(normalizeCondition(taxonomy, input)).toBe(expected);
    });

    it('更具体的分类优先于宽泛的分类', () => {
      expect(normalizeCondition(taxonomy, 'Partly cloudy')).toBe('Partly Cloudy');
      expect(normalizeCondition(taxonomy, 'PARTLY CLOUDY')).toBe('Partly Cloudy');
    });

    it('无法匹配时原样返回', () => {
      expect(normalizeCondition(taxonomy, 'Unknown xyz')).toBe('Unknown xyz');
    });

    it('空串仍然是空串', () => {
      expect(normalizeCondition(taxonomy, '')).toBe('');
    });
  });

  describe('conditionGlyph', () => {
    it('应该返回分类对应的符号', () => {
      expect(conditionGlyph(taxonomy, 'Clear')).toBe('☀️');
      expect(conditionGlyph(taxonomy, 'Partly cloudy')).toBe('⛅');
      expect(conditionGlyph(taxonomy, 'Heavy rain')).toBe('🌧️');
    });

    it('没有匹配时返回默认符号', () => {
      expect(conditionGlyph(taxonomy, 'No valid data')).toBe(NO_DATA_GLYPH);
      expect(conditionGlyph(taxonomy, '')).toBe(NO_DATA_GLYPH);
    });
  });

  describe('mapWmoCode', () => {
    it.each([
      [0, 'Clear'],
      [2, 'Partly Cloudy'],
      [45, 'Foggy'],
      [61, 'Rainy'],
      [73, 'Snowy'],
      [95, 'Stormy'],
    ])('WMO %d -> %s', (code, expected) => {
      expect(mapWmoCode(taxonomy, code)).toBe(expected);
    });

    it('超出区间返回 Unknown', () => {
      expect(mapWmoCode(taxonomy, 150)).toBe('Unknown');
      expect(mapWmoCode(taxonomy, -1)).toBe('Unknown');
    });
  });

  describe('mapTomorrowCode', () => {
    it('应该按代码表映射', () => {
      expect(mapTomorrowCode(taxonomy, 1101)).toBe('Partly Cloudy');
      expect(mapTomorrowCode(taxonomy, 8000)).toBe('Thunderstorm');
    });

    it('未知代码返回 Unknown', () => {
      expect(mapTomorrowCode(taxonomy, 1234)).toBe('Unknown');
    });
  });

  describe('parseConditionTaxonomy', () => {
    it('应该保持配置中的优先级顺序并冻结结果', () => {
      expect(taxonomy.categories.map((c) => c.canonicalName)).toEqual([
        'Partly Cloudy',
        'Clear',
        'Cloudy',
        'Rainy',
        'Snowy',
        'Foggy',
        'Stormy',
      ]);
      expect(Object.isFrozen(taxonomy)).toBe(true);
      expect(Object.isFrozen(taxonomy.categories[0].keywords)).toBe(true);
    });

    it('关键词统一转为小写', () => {
      const parsed = parseConditionTaxonomy({
        wmo: { ranges: [] },
        conditions: [{ name: 'Clear', keywords: ['SUNNY'], glyph: '☀️' }],
      });
      expect(parsed.categories[0].keywords).toEqual(['sunny']);
      expect(normalizeCondition(parsed, 'Mostly sunny')).toBe('Clear');
    });

    it('缺少 wmo.ranges 时应该抛出格式错误', () => {
      expect(() => parseConditionTaxonomy({ conditions: [] })).toThrow(WeatherCodesFormatError);
    });

    it('conditions 为空时应该抛出格式错误', () => {
      expect(() => parseConditionTaxonomy({ wmo: { ranges: [] }, conditions: [] })).toThrow(
        'Invalid weather codes config: conditions must be a non-empty array',
      );
    });
  });
});
