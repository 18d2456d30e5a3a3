// src/weather/weather.module.spec.ts

import { Test } from '@nestjs/testing';
import { AxiosInstance } from 'axios';
import { AppModule } from '../app.module';
import { WeatherService } from './services/weather.service';
import { WeatherController } from './weather.controller';
import { WEATHER_HTTP_CLIENT } from './services/fetch-orchestrator.service';

describe('WeatherModule', () => {
  it('应该能完成依赖注入', async () => {
    const module = await Test.createTestingModule({ imports: [AppModule] }).compile();

    expect(module.get(WeatherService)).toBeInstanceOf(WeatherService);
    expect(module.get(WeatherController)).toBeInstanceOf(WeatherController);

    const session = module.get<AxiosInstance>(WEATHER_HTTP_CLIENT);
    expect(session.defaults.headers['User-Agent']).toBe('weather-consensus/1.0');

    await module.close();
  });
});
